import { readFileSync } from "node:fs";
import {
	ConfigError,
	Err,
	isLogLevel,
	isValidIdentifier,
	type LogLevel,
	Ok,
	type Result,
	toError,
} from "@silverline/core";

/** Where the bronze Parquet partitions live */
export interface BronzeConfig {
	/** S3-compatible endpoint; omit for AWS S3 */
	endpoint?: string;
	bucket: string;
	region?: string;
	/** Top-level key prefix (default `bronze`) */
	prefix: string;
	/** Source database segment of the partition layout */
	sourceDatabase: string;
	credentials?: {
		accessKeyId: string;
		secretAccessKey: string;
	};
}

interface WarehouseDatasets {
	/** Dataset holding the silver tables */
	silverDataset: string;
	/** Dataset holding transient staging relations */
	stagingDataset: string;
}

/** BigQuery warehouse settings */
export interface BigQueryConfig extends WarehouseDatasets {
	type: "bigquery";
	projectId: string;
	location?: string;
	keyFilename?: string;
}

/** Local sql.js warehouse settings */
export interface SqliteConfig extends WarehouseDatasets {
	type: "sqlite";
	/** Database file; in-memory when omitted */
	path?: string;
}

export type WarehouseConfig = BigQueryConfig | SqliteConfig;

/** Per-step time budgets in milliseconds */
export interface StepTimeouts {
	locateMs: number;
	loadMs: number;
	applyMs: number;
	cleanupMs: number;
	/** How long a timed-out or cancelled step may keep writing before staging is dropped */
	graceMs: number;
}

/** Run-level ingestion settings */
export interface IngestionSettings {
	/** Tables processed concurrently */
	parallelism: number;
	/** IANA zone in which "yesterday" is computed */
	timeZone: string;
	/** Rows per staging INSERT statement, before the dialect's parameter cap */
	insertBatchSize: number;
	timeouts: StepTimeouts;
}

/** The validated configuration document */
export interface SilverlineConfig {
	logLevel: LogLevel;
	bronze: BronzeConfig;
	warehouse: WarehouseConfig;
	ingestion: IngestionSettings;
	/** Raw strategy entries; validated by the strategy registry */
	tableStrategies: Record<string, unknown>;
}

/** Default config file, relative to the working directory */
export const DEFAULT_CONFIG_PATH = "silverline.json";

export const DEFAULT_TIMEOUTS: StepTimeouts = {
	locateMs: 60_000,
	loadMs: 600_000,
	applyMs: 600_000,
	cleanupMs: 60_000,
	graceMs: 30_000,
};

export const DEFAULT_INGESTION: IngestionSettings = {
	parallelism: 4,
	timeZone: "UTC",
	insertBatchSize: 500,
	timeouts: DEFAULT_TIMEOUTS,
};

type Fields = Record<string, unknown>;

function isObject(value: unknown): value is Fields {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireObject(parent: Fields, key: string, path: string): Result<Fields, ConfigError> {
	const value = parent[key];
	if (!isObject(value)) {
		return Err(new ConfigError(`${path} must be an object`));
	}
	return Ok(value);
}

function requireString(obj: Fields, key: string, path: string): Result<string, ConfigError> {
	const value = obj[key];
	if (typeof value !== "string" || value.length === 0) {
		return Err(new ConfigError(`${path}.${key} must be a non-empty string`));
	}
	return Ok(value);
}

function optionalString(obj: Fields, key: string, path: string): Result<string | undefined, ConfigError> {
	if (obj[key] === undefined) return Ok(undefined);
	return requireString(obj, key, path);
}

function optionalPositiveInt(
	obj: Fields,
	key: string,
	path: string,
	fallback: number,
): Result<number, ConfigError> {
	const value = obj[key];
	if (value === undefined) return Ok(fallback);
	if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
		return Err(new ConfigError(`${path}.${key} must be a positive integer`));
	}
	return Ok(value);
}

function requireDataset(obj: Fields, key: string, path: string): Result<string, ConfigError> {
	const name = requireString(obj, key, path);
	if (!name.ok) return name;
	if (!isValidIdentifier(name.value)) {
		return Err(new ConfigError(`${path}.${key} "${name.value}" is not a valid dataset name`));
	}
	return name;
}

function isTimeZone(zone: string): boolean {
	try {
		new Intl.DateTimeFormat("en-CA", { timeZone: zone });
		return true;
	} catch {
		return false;
	}
}

function validateBronze(root: Fields): Result<BronzeConfig, ConfigError> {
	const section = requireObject(root, "bronze", "bronze");
	if (!section.ok) return section;
	const obj = section.value;

	const bucket = requireString(obj, "bucket", "bronze");
	if (!bucket.ok) return bucket;
	const sourceDatabase = requireString(obj, "sourceDatabase", "bronze");
	if (!sourceDatabase.ok) return sourceDatabase;
	const endpoint = optionalString(obj, "endpoint", "bronze");
	if (!endpoint.ok) return endpoint;
	const region = optionalString(obj, "region", "bronze");
	if (!region.ok) return region;
	const prefix = optionalString(obj, "prefix", "bronze");
	if (!prefix.ok) return prefix;

	let credentials: BronzeConfig["credentials"];
	if (obj.credentials !== undefined) {
		const creds = requireObject(obj, "credentials", "bronze.credentials");
		if (!creds.ok) return creds;
		const accessKeyId = requireString(creds.value, "accessKeyId", "bronze.credentials");
		if (!accessKeyId.ok) return accessKeyId;
		const secretAccessKey = requireString(creds.value, "secretAccessKey", "bronze.credentials");
		if (!secretAccessKey.ok) return secretAccessKey;
		credentials = { accessKeyId: accessKeyId.value, secretAccessKey: secretAccessKey.value };
	}

	return Ok({
		endpoint: endpoint.value,
		bucket: bucket.value,
		region: region.value,
		prefix: (prefix.value ?? "bronze").replace(/\/+$/, ""),
		sourceDatabase: sourceDatabase.value,
		credentials,
	});
}

function validateWarehouse(root: Fields): Result<WarehouseConfig, ConfigError> {
	const section = requireObject(root, "warehouse", "warehouse");
	if (!section.ok) return section;
	const obj = section.value;

	const silverDataset = requireDataset(obj, "silverDataset", "warehouse");
	if (!silverDataset.ok) return silverDataset;
	const stagingDataset = requireDataset(obj, "stagingDataset", "warehouse");
	if (!stagingDataset.ok) return stagingDataset;

	switch (obj.type) {
		case "bigquery": {
			const projectId = requireString(obj, "projectId", "warehouse");
			if (!projectId.ok) return projectId;
			const location = optionalString(obj, "location", "warehouse");
			if (!location.ok) return location;
			const keyFilename = optionalString(obj, "keyFilename", "warehouse");
			if (!keyFilename.ok) return keyFilename;
			return Ok({
				type: "bigquery",
				projectId: projectId.value,
				location: location.value,
				keyFilename: keyFilename.value,
				silverDataset: silverDataset.value,
				stagingDataset: stagingDataset.value,
			});
		}
		case "sqlite": {
			const path = optionalString(obj, "path", "warehouse");
			if (!path.ok) return path;
			return Ok({
				type: "sqlite",
				path: path.value,
				silverDataset: silverDataset.value,
				stagingDataset: stagingDataset.value,
			});
		}
		default:
			return Err(
				new ConfigError(
					`warehouse.type must be one of bigquery, sqlite, got ${JSON.stringify(obj.type)}`,
				),
			);
	}
}

function validateIngestion(root: Fields): Result<IngestionSettings, ConfigError> {
	if (root.ingestion === undefined) return Ok(DEFAULT_INGESTION);
	const section = requireObject(root, "ingestion", "ingestion");
	if (!section.ok) return section;
	const obj = section.value;

	const parallelism = optionalPositiveInt(obj, "parallelism", "ingestion", DEFAULT_INGESTION.parallelism);
	if (!parallelism.ok) return parallelism;
	const insertBatchSize = optionalPositiveInt(
		obj,
		"insertBatchSize",
		"ingestion",
		DEFAULT_INGESTION.insertBatchSize,
	);
	if (!insertBatchSize.ok) return insertBatchSize;

	const timeZone = optionalString(obj, "timeZone", "ingestion");
	if (!timeZone.ok) return timeZone;
	const zone = timeZone.value ?? DEFAULT_INGESTION.timeZone;
	if (!isTimeZone(zone)) {
		return Err(new ConfigError(`ingestion.timeZone "${zone}" is not a known time zone`));
	}

	let timeouts = DEFAULT_TIMEOUTS;
	if (obj.timeouts !== undefined) {
		const t = requireObject(obj, "timeouts", "ingestion.timeouts");
		if (!t.ok) return t;
		const resolved: StepTimeouts = { ...DEFAULT_TIMEOUTS };
		for (const key of ["locateMs", "loadMs", "applyMs", "cleanupMs", "graceMs"] as const) {
			const ms = optionalPositiveInt(t.value, key, "ingestion.timeouts", DEFAULT_TIMEOUTS[key]);
			if (!ms.ok) return ms;
			resolved[key] = ms.value;
		}
		timeouts = resolved;
	}

	return Ok({
		parallelism: parallelism.value,
		timeZone: zone,
		insertBatchSize: insertBatchSize.value,
		timeouts,
	});
}

/**
 * Validate a configuration document for structural correctness.
 *
 * Strategy entries are only checked to be an object here; their
 * contents are validated by {@link createStrategyRegistry}.
 *
 * @param input - Parsed JSON document.
 */
export function validateConfig(input: unknown): Result<SilverlineConfig, ConfigError> {
	if (!isObject(input)) {
		return Err(new ConfigError("Configuration must be a JSON object"));
	}

	const logLevel = input.logLevel ?? "info";
	if (!isLogLevel(logLevel)) {
		return Err(new ConfigError("logLevel must be one of debug, info, warn, error"));
	}

	const bronze = validateBronze(input);
	if (!bronze.ok) return bronze;
	const warehouse = validateWarehouse(input);
	if (!warehouse.ok) return warehouse;
	const ingestion = validateIngestion(input);
	if (!ingestion.ok) return ingestion;

	const strategies = requireObject(input, "tableStrategies", "tableStrategies");
	if (!strategies.ok) return strategies;

	return Ok({
		logLevel,
		bronze: bronze.value,
		warehouse: warehouse.value,
		ingestion: ingestion.value,
		tableStrategies: strategies.value,
	});
}

/**
 * Apply environment overrides on top of a validated configuration.
 *
 * - `SILVERLINE_LOG_LEVEL` replaces `logLevel`
 * - `SILVERLINE_BRONZE_ACCESS_KEY_ID` / `SILVERLINE_BRONZE_SECRET_ACCESS_KEY` replace the bronze credentials (both required)
 */
export function applyEnvOverrides(
	config: SilverlineConfig,
	env: Record<string, string | undefined>,
): Result<SilverlineConfig, ConfigError> {
	let logLevel = config.logLevel;
	const envLevel = env.SILVERLINE_LOG_LEVEL;
	if (envLevel !== undefined && envLevel !== "") {
		if (!isLogLevel(envLevel)) {
			return Err(new ConfigError(`SILVERLINE_LOG_LEVEL "${envLevel}" is not a log level`));
		}
		logLevel = envLevel;
	}

	let credentials = config.bronze.credentials;
	const accessKeyId = env.SILVERLINE_BRONZE_ACCESS_KEY_ID;
	const secretAccessKey = env.SILVERLINE_BRONZE_SECRET_ACCESS_KEY;
	if (accessKeyId || secretAccessKey) {
		if (!accessKeyId || !secretAccessKey) {
			return Err(
				new ConfigError(
					"SILVERLINE_BRONZE_ACCESS_KEY_ID and SILVERLINE_BRONZE_SECRET_ACCESS_KEY must be set together",
				),
			);
		}
		credentials = { accessKeyId, secretAccessKey };
	}

	return Ok({ ...config, logLevel, bronze: { ...config.bronze, credentials } });
}

/**
 * Read, parse and validate the configuration file, then apply environment overrides.
 */
export function loadConfig(
	path: string,
	env: Record<string, string | undefined> = process.env,
): Result<SilverlineConfig, ConfigError> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, "utf-8"));
	} catch (err) {
		const cause = toError(err);
		return Err(new ConfigError(`Failed to read config "${path}": ${cause.message}`, cause));
	}

	const validated = validateConfig(parsed);
	if (!validated.ok) return validated;
	return applyEnvOverrides(validated.value, env);
}
