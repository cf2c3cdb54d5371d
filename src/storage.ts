import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  HeadBucketCommand
} from "@aws-sdk/client-s3";
import { describeError } from "./logger.js";

export type StorageConfig = {
  type: "local" | "s3";
  bucket?: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  basePath?: string;
};

export type StoredArtifact = {
  key: string;
  uri: string;
  size: number;
};

export type ArtifactBody = string | Uint8Array;

export type StorageClient = {
  put: (key: string, body: ArtifactBody, contentType?: string) => Promise<StoredArtifact>;
  get: (key: string) => Promise<string | null>;
  list: (prefix: string) => Promise<string[]>;
};

export function describeStorage(config: StorageConfig) {
  return {
    type: config.type,
    bucket: config.bucket ?? null,
    region: config.region ?? null,
    endpoint: config.endpoint ?? null,
    forcePathStyle: config.forcePathStyle ?? false
  };
}

export function createStorageClient(config: StorageConfig): StorageClient {
  if (config.type === "local") {
    return createLocalClient(resolveBasePath(config));
  }
  return createS3Client(config);
}

export async function validateStorage(config: StorageConfig) {
  if (config.type === "local") {
    await mkdir(resolveBasePath(config), { recursive: true });
    return;
  }
  if (!config.bucket) {
    throw new Error("Storage validation failed: missing bucket name.");
  }
  try {
    await buildS3Client(config).send(new HeadBucketCommand({ Bucket: config.bucket }));
  } catch (error) {
    const status = describeError(error).httpStatusCode;
    const hint =
      status === 403
        ? "Check access keys and bucket permissions."
        : status === 404
        ? "Bucket not found; check bucket name and endpoint."
        : "Check endpoint and credentials.";
    throw new Error(`Storage validation failed (${String(status ?? "unknown")}): ${hint}`);
  }
}

function resolveBasePath(config: StorageConfig) {
  return config.basePath ?? join(process.cwd(), "out");
}

function byteLength(body: ArtifactBody) {
  return typeof body === "string" ? Buffer.byteLength(body, "utf8") : body.byteLength;
}

function createLocalClient(basePath: string): StorageClient {
  return {
    async put(key, body) {
      const filePath = join(basePath, key);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, body);
      return { key, uri: filePath, size: byteLength(body) };
    },
    async get(key) {
      try {
        return await readFile(join(basePath, key), "utf8");
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    },
    async list(prefix) {
      try {
        const entries = await readDirRecursive(join(basePath, prefix));
        return entries.map((entry) => join(prefix, entry)).sort();
      } catch (error) {
        if (isNotFound(error)) return [];
        throw error;
      }
    }
  };
}

function buildS3Client(config: StorageConfig) {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: config.accessKeyId
      ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey ?? ""
        }
      : undefined
  });
}

function createS3Client(config: StorageConfig): StorageClient {
  const bucket = config.bucket;
  if (!bucket) {
    throw new Error("Missing storage.bucket for S3.");
  }
  const client = buildS3Client(config);

  return {
    async put(key, body, contentType) {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType ?? "text/plain; charset=utf-8"
        })
      );
      return { key, uri: `s3://${bucket}/${key}`, size: byteLength(body) };
    },
    async get(key) {
      try {
        const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        return response.Body ? await response.Body.transformToString("utf-8") : null;
      } catch (error) {
        if (describeError(error).httpStatusCode === 404) return null;
        throw error;
      }
    },
    async list(prefix) {
      const keys: string[] = [];
      let continuationToken: string | undefined;
      do {
        const response = await client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken
          })
        );
        for (const item of response.Contents ?? []) {
          if (item.Key) keys.push(item.Key);
        }
        continuationToken = response.NextContinuationToken;
      } while (continuationToken);
      return keys;
    }
  };
}

function isNotFound(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readDirRecursive(dirPath: string): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      const sub = await readDirRecursive(fullPath);
      files.push(...sub.map((item) => join(entry.name, item)));
    } else {
      files.push(entry.name);
    }
  }
  return files;
}
