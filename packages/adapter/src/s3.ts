import {
	GetObjectCommand,
	ListObjectsV2Command,
	PutObjectCommand,
	S3Client,
} from "@aws-sdk/client-s3";
import { AdapterError, type Result } from "@silverline/core";
import { wrapAsync } from "./shared";
import type { LakeStoreConfig, LakeAdapter, ObjectInfo } from "./types";

/**
 * S3-compatible lake adapter (AWS S3, MinIO, GCS interoperability endpoints).
 *
 * Wraps the AWS S3 SDK to provide a Result-based interface over the bronze
 * store. All public methods return `Result` and never throw.
 */
export class S3LakeAdapter implements LakeAdapter {
	/** @internal */
	readonly client: S3Client;
	private readonly bucket: string;

	constructor(config: LakeStoreConfig) {
		this.bucket = config.bucket;
		this.client = new S3Client({
			endpoint: config.endpoint,
			region: config.region ?? "us-east-1",
			credentials: config.credentials,
			// Path-style addressing for custom endpoints such as MinIO
			forcePathStyle: config.endpoint !== undefined,
		});
	}

	/** Store an object in the lake */
	async putObject(
		path: string,
		data: Uint8Array,
		contentType?: string,
	): Promise<Result<void, AdapterError>> {
		return wrapAsync(async () => {
			await this.client.send(
				new PutObjectCommand({
					Bucket: this.bucket,
					Key: path,
					Body: data,
					ContentType: contentType,
				}),
			);
		}, `Failed to put object: ${path}`);
	}

	/** Retrieve an object from the lake */
	async getObject(path: string, signal?: AbortSignal): Promise<Result<Uint8Array, AdapterError>> {
		return wrapAsync(async () => {
			const response = await this.client.send(
				new GetObjectCommand({
					Bucket: this.bucket,
					Key: path,
				}),
				{ abortSignal: signal },
			);
			const bytes = await response.Body?.transformToByteArray();
			if (!bytes) {
				throw new AdapterError(`Empty response for object: ${path}`);
			}
			return bytes;
		}, `Failed to get object: ${path}`);
	}

	/** List every object under a prefix, following continuation tokens */
	async listObjects(
		prefix: string,
		signal?: AbortSignal,
	): Promise<Result<ObjectInfo[], AdapterError>> {
		return wrapAsync(async () => {
			const objects: ObjectInfo[] = [];
			let continuationToken: string | undefined;
			do {
				const response = await this.client.send(
					new ListObjectsV2Command({
						Bucket: this.bucket,
						Prefix: prefix,
						ContinuationToken: continuationToken,
					}),
					{ abortSignal: signal },
				);
				for (const item of response.Contents ?? []) {
					if (!item.Key) continue;
					objects.push({
						key: item.Key,
						size: item.Size ?? 0,
						lastModified: item.LastModified ?? new Date(0),
					});
				}
				continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
			} while (continuationToken);
			return objects;
		}, `Failed to list objects with prefix: ${prefix}`);
	}
}
