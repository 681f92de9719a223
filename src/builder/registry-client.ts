import { ResolutionError, errorMessage } from "../errors.js";
import type { RegistryClient, ResolvedVersion } from "./types.js";

export interface RegistryClientOptions {
  /** Base of the JSON API, e.g. https://pypi.org/pypi */
  readonly baseUrl: string;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Resolves the current "latest" release from a PyPI-compatible JSON API.
 * Nothing is cached: every call asks the registry again.
 */
export function createRegistryClient(
  options: RegistryClientOptions,
): RegistryClient {
  const fetchImpl = options.fetchImpl ?? fetch;
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  return {
    async resolveLatest(name: string): Promise<ResolvedVersion> {
      try {
        const url = `${baseUrl}/${encodeURIComponent(name)}/json`;
        const response = await fetchImpl(url, {
          headers: { accept: "application/json" },
        });
        if (response.status !== 200) {
          throw new ResolutionError(
            `Registry request failed with status ${response.status}`,
          );
        }
        const version = readVersion(await response.json());
        if (!version) {
          throw new ResolutionError(
            "Version information not found in registry response",
          );
        }
        return { name, version };
      } catch (error) {
        throw new ResolutionError(
          `Failed to get latest version for ${name}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    },
  };
}

function readVersion(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.info)) {
    return undefined;
  }
  const version = body.info.version;
  return typeof version === "string" && version.trim().length > 0
    ? version.trim()
    : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
