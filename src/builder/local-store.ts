import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { PublishError, errorMessage, isNotFound } from "../errors.js";
import type { ObjectStore, PublishedLocation } from "./types.js";

export interface ObjectVersionEntry {
  readonly id: string;
  readonly key: string;
  readonly created: string;
  readonly file: string;
  readonly size: number;
}

export interface BucketIndex {
  readonly versions: readonly ObjectVersionEntry[];
}

export interface LocalObjectStore extends ObjectStore {
  readonly dataDir: string;
  listVersions(bucket: string, key: string): Promise<ObjectVersionEntry[]>;
  /** Absolute path of the current object under `key`, or null. */
  resolveCurrent(bucket: string, key: string): Promise<string | null>;
}

export interface LocalObjectStoreOptions {
  readonly now?: () => Date;
}

const DEFAULT_DIR = ".layerproof";
const OBJECTS_DIR = "objects";
const INDEX_FILE = "index.json";

export function resolveStoreDir(customDir?: string): string {
  if (customDir) {
    if (customDir.includes("~")) {
      throw new Error("store-dir must not include '~'. Use an absolute path.");
    }
    return path.resolve(customDir);
  }
  return path.join(process.cwd(), DEFAULT_DIR, "store");
}

/**
 * Directory-backed object store. Every put is kept as a version; the newest
 * write of a key is the current object.
 */
export function createLocalObjectStore(
  dataDir: string,
  options: LocalObjectStoreOptions = {},
): LocalObjectStore {
  const now = options.now ?? (() => new Date());

  const listVersions = async (
    bucket: string,
    key: string,
  ): Promise<ObjectVersionEntry[]> => {
    const index = await loadIndex(path.join(dataDir, bucket));
    return index.versions
      .filter((entry) => entry.key === key)
      .sort(compareVersions);
  };

  return {
    dataDir,

    async put(
      bucket: string,
      key: string,
      filePath: string,
    ): Promise<PublishedLocation> {
      try {
        assertSafeName(bucket, "bucket");
        assertSafeKey(key);
        const bucketDir = path.join(dataDir, bucket);
        const index = await loadIndex(bucketDir);
        const id = uniqueId(
          formatTimestamp(now()),
          index.versions.map((entry) => entry.id),
        );
        const relativeFile = path.posix.join(OBJECTS_DIR, id, key);
        const target = path.join(bucketDir, relativeFile);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.copyFile(filePath, target);
        const stats = await fs.stat(target);

        const entry: ObjectVersionEntry = {
          id,
          key,
          created: now().toISOString(),
          file: relativeFile,
          size: stats.size,
        };
        await writeIndex(bucketDir, { versions: [...index.versions, entry] });
        return {
          bucket,
          key,
          location: pathToFileURL(target).href,
        };
      } catch (error) {
        throw new PublishError(
          `Upload to local store ${bucket}/${key} failed: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    },

    listVersions,

    async resolveCurrent(bucket: string, key: string): Promise<string | null> {
      const versions = await listVersions(bucket, key);
      const current = versions[0];
      return current ? path.join(dataDir, bucket, current.file) : null;
    },
  };
}

async function loadIndex(bucketDir: string): Promise<BucketIndex> {
  try {
    const raw = await fs.readFile(path.join(bucketDir, INDEX_FILE), "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed) || !Array.isArray(parsed.versions)) {
      return { versions: [] };
    }
    return { versions: parsed.versions.filter(isVersionEntry) };
  } catch (error) {
    if (isNotFound(error)) {
      return { versions: [] };
    }
    throw error;
  }
}

async function writeIndex(
  bucketDir: string,
  index: BucketIndex,
): Promise<void> {
  await fs.mkdir(bucketDir, { recursive: true });
  await fs.writeFile(
    path.join(bucketDir, INDEX_FILE),
    JSON.stringify(index, null, 2),
    "utf8",
  );
}

function isVersionEntry(value: unknown): value is ObjectVersionEntry {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.key === "string" &&
    typeof value.created === "string" &&
    typeof value.file === "string" &&
    typeof value.size === "number"
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertSafeName(value: string, label: string): void {
  if (
    !value ||
    value.includes("/") ||
    value.includes("\\") ||
    value.startsWith(".")
  ) {
    throw new Error(`Invalid ${label} name: ${value}`);
  }
}

function assertSafeKey(key: string): void {
  const segments = key.split("/");
  if (segments.some((segment) => segment === "" || segment === "..")) {
    throw new Error(`Invalid object key: ${key}`);
  }
}

function formatTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, "Z")
    .replace(/:/g, "");
}

function uniqueId(base: string, existing: readonly string[]): string {
  if (!existing.includes(base)) {
    return base;
  }
  let counter = 1;
  let candidate = `${base}-${counter}`;
  while (existing.includes(candidate)) {
    counter += 1;
    candidate = `${base}-${counter}`;
  }
  return candidate;
}

function compareVersions(
  a: ObjectVersionEntry,
  b: ObjectVersionEntry,
): number {
  if (a.created !== b.created) {
    return a.created > b.created ? -1 : 1;
  }
  return b.id.localeCompare(a.id);
}
