import type { AdapterError, Result } from "@silverline/core";

/** One listed bronze object */
export interface ObjectInfo {
	key: string;
	/** Bytes */
	size: number;
	/** Arrival time; orders the files of a partition */
	lastModified: Date;
}

/** Where the bronze store lives and how to reach it */
export interface LakeStoreConfig {
	/** S3-compatible endpoint (MinIO, GCS interoperability); omit for AWS S3 */
	endpoint?: string;
	bucket: string;
	/** Defaults to us-east-1 */
	region?: string;
	/** Static keys; the SDK's default provider chain applies when omitted */
	credentials?: {
		accessKeyId: string;
		secretAccessKey: string;
	};
}

/**
 * The bronze object store as the ingestion pipeline sees it.
 * Reads are abortable; writes exist for fixtures and backfills.
 */
export interface LakeAdapter {
	putObject(path: string, data: Uint8Array, contentType?: string): Promise<Result<void, AdapterError>>;

	getObject(path: string, signal?: AbortSignal): Promise<Result<Uint8Array, AdapterError>>;

	/** Every object under `prefix`, across all listing pages */
	listObjects(prefix: string, signal?: AbortSignal): Promise<Result<ObjectInfo[], AdapterError>>;
}
