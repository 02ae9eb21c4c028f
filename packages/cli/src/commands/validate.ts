import { isKeyedDescriptor } from "@silverline/core";
import { loadSettings } from "../config";
import type { CommandContext } from "../context";
import { print, printError, printTable } from "../output";

/**
 * `silverline validate`: check the configuration and list each table's strategy.
 */
export function validate(flags: Record<string, string>, ctx: Pick<CommandContext, "env">): number {
	const settings = loadSettings(flags, ctx.env);
	if (!settings.ok) {
		printError(settings.error.message);
		return 1;
	}

	const { registry } = settings.value;
	const rows = registry.tables().flatMap((table) => {
		const resolved = registry.resolve(table);
		if (!resolved.ok) return [];
		const descriptor = resolved.value;
		return [
			{
				table,
				strategy: descriptor.kind,
				keys: isKeyedDescriptor(descriptor) ? descriptor.keyColumns.join(",") : "",
				ordering: isKeyedDescriptor(descriptor) ? descriptor.orderingColumn : "",
				partition: isKeyedDescriptor(descriptor) ? "" : descriptor.partitionField,
				cluster: descriptor.clusterColumns.join(","),
			},
		];
	});

	printTable(rows);
	print("");
	print(`Configuration OK: ${rows.length} table${rows.length === 1 ? "" : "s"}`);
	return 0;
}
