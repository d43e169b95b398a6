/**
 * DuckDB Extensions Service
 * Installs and loads the extensions named in the gateway configuration
 */

import type { Logger } from "./logger";

type RunFn = (sql: string) => Promise<void>;
type QueryFn = (sql: string) => Promise<Record<string, unknown>[]>;

export interface ExtensionSpec {
  name: string;
  /** true: community repository only; "auto": core first, community on 404 */
  community: boolean | "auto";
}

const EXTENSION_NAME = /^[A-Za-z0-9_]+$/;

/**
 * Parse a configured extension entry. `spatial` tries core then community,
 * `h3:community` goes straight to the community repository.
 */
export function parseExtensionSpec(entry: string): ExtensionSpec {
  const [name, repository, ...rest] = entry.trim().split(":");
  if (!name || !EXTENSION_NAME.test(name) || rest.length > 0) {
    throw new Error(`Invalid extension name: ${entry}`);
  }
  if (repository === undefined) {
    return { name, community: "auto" };
  }
  if (repository === "community") {
    return { name, community: true };
  }
  if (repository === "core") {
    return { name, community: false };
  }
  throw new Error(`Unknown extension repository "${repository}" in ${entry}`);
}

/** DuckDB reports an extension missing from a repository as an HTTP 404. */
function isMissingFromRepository(err: unknown): boolean {
  return /\b404\b|not found/i.test(String(err));
}

function installStatement(name: string, fromCommunity: boolean): string {
  return fromCommunity ? `INSTALL ${name} FROM community` : `INSTALL ${name}`;
}

/**
 * Download `spec.name` into the local extension directory. An "auto" spec is
 * looked up in the core repository first and in community when core has no
 * such extension.
 */
export async function installExtension(runFn: RunFn, spec: ExtensionSpec): Promise<void> {
  if (spec.community !== "auto") {
    await runFn(installStatement(spec.name, spec.community));
    return;
  }

  try {
    await runFn(installStatement(spec.name, false));
  } catch (err) {
    if (!isMissingFromRepository(err)) throw err;
    await runFn(installStatement(spec.name, true));
  }
}

export async function loadExtension(runFn: RunFn, name: string): Promise<void> {
  await runFn(`LOAD ${name}`);
}

export async function installAndLoadExtension(
  runFn: RunFn,
  spec: ExtensionSpec
): Promise<void> {
  await installExtension(runFn, spec);
  await loadExtension(runFn, spec.name);
}

export async function getLoadedExtensions(queryFn: QueryFn): Promise<string[]> {
  const rows = await queryFn(
    `SELECT extension_name FROM duckdb_extensions() WHERE loaded = true ORDER BY extension_name`
  );
  return rows.map((row) => String(row.extension_name));
}

/**
 * Install and load every configured extension, in order.
 * The first failure rejects.
 */
export async function loadConfiguredExtensions(
  runFn: RunFn,
  entries: readonly string[],
  logger: Logger
): Promise<void> {
  for (const entry of entries) {
    const spec = parseExtensionSpec(entry);
    const started = performance.now();
    await installAndLoadExtension(runFn, spec);
    logger.info(
      `Loaded extension ${spec.name} in ${Math.round(performance.now() - started)} ms`
    );
  }
}
