#!/usr/bin/env node

import { runCli } from "./cli";
import { fatal } from "./output";

runCli(process.argv).then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		fatal(String(err));
	},
);
