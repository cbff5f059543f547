import * as fs from "fs";
import * as path from "path";
import { loadConfig } from "./config.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { errorMessage, isRecord } from "./shared.js";
import type {
  JsonObject,
  Lookup,
  RepositoryRecord,
  RepositoryResults,
  ResultsLookup,
  SaveOutcome,
} from "./types.js";

export const DEFAULT_REPOSITORIES_FILE = "repositories.jsonl";
export const DEFAULT_RESULTS_DIR = "results";

const RESULTS_EXTENSION = ".json";

export interface RepositoryStoreOptions {
  baseDir: string;
  repositoriesFile?: string;
  resultsDir?: string;
  logger?: Logger;
}

function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value);
}

function parseRecordLine(line: string, lineNumber: number): RepositoryRecord {
  const parsed: unknown = JSON.parse(line);
  if (!isJsonObject(parsed)) {
    throw new Error(`line ${lineNumber.toString()} is not a JSON object`);
  }
  return parsed;
}

/**
 * Read-only view over a JSON Lines file of repository records, plus a
 * directory of per-repository results documents.
 *
 * Every lookup re-reads the backing file. Results writes are plain
 * overwrites with no locking.
 */
export class RepositoryStore {
  readonly repositoriesPath: string;
  readonly resultsDir: string;
  private readonly logger: Logger;

  constructor(options: RepositoryStoreOptions) {
    this.repositoriesPath = path.resolve(
      options.baseDir,
      options.repositoriesFile ?? DEFAULT_REPOSITORIES_FILE
    );
    this.resultsDir = path.resolve(options.baseDir, options.resultsDir ?? DEFAULT_RESULTS_DIR);
    this.logger = options.logger ?? createConsoleLogger();
  }

  /**
   * Blank lines are skipped anywhere in the file. Records before a malformed
   * line are still returned.
   */
  loadRepositories(): RepositoryRecord[] {
    const repositories: RepositoryRecord[] = [];

    if (!fs.existsSync(this.repositoriesPath)) {
      this.logger.warn(`Repositories file not found: ${this.repositoriesPath}`);
      return repositories;
    }

    try {
      const lines = fs.readFileSync(this.repositoriesPath, "utf-8").split(/\r?\n/);
      for (const [index, line] of lines.entries()) {
        if (line.trim() === "") continue;
        repositories.push(parseRecordLine(line, index + 1));
      }
    } catch (err) {
      this.logger.error(`Error loading repositories: ${errorMessage(err)}`);
    }

    return repositories;
  }

  getRepositoryById(repoId: string): Lookup<RepositoryRecord> {
    const match = this.loadRepositories().find((repo) => repo.id === repoId);
    return match === undefined ? { found: false } : { found: true, value: match };
  }

  resultsPathFor(repoId: string): string {
    return path.join(this.resultsDir, `${repoId}${RESULTS_EXTENSION}`);
  }

  // Ids that resolve outside resultsDir (separators, "..") have no results file.
  private containedResultsPath(repoId: string): string | null {
    const resultsPath = this.resultsPathFor(repoId);
    return path.dirname(resultsPath) === this.resultsDir ? resultsPath : null;
  }

  /** `repoId` becomes the file name, so it must not contain path separators. */
  saveRepositoryResults(repoId: string, results: RepositoryResults): SaveOutcome {
    const resultsPath = this.containedResultsPath(repoId);
    if (resultsPath === null) {
      const message = "id is not a safe file name";
      this.logger.error(`Error saving results for repository ${repoId}: ${message}`);
      return { ok: false, error: message };
    }

    try {
      fs.mkdirSync(this.resultsDir, { recursive: true });
      fs.writeFileSync(resultsPath, JSON.stringify(results, null, 2));
      return { ok: true, path: resultsPath };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Error saving results for repository ${repoId}: ${message}`);
      return { ok: false, error: message };
    }
  }

  getRepositoryResults(repoId: string): ResultsLookup {
    const resultsPath = this.containedResultsPath(repoId);
    if (resultsPath === null || !fs.existsSync(resultsPath)) {
      return { found: false, reason: "missing" };
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(resultsPath, "utf-8"));
      if (!isJsonObject(parsed)) {
        throw new Error("expected a JSON object");
      }
      return { found: true, value: parsed };
    } catch (err) {
      this.logger.error(`Error loading results for repository ${repoId}: ${errorMessage(err)}`);
      return { found: false, reason: "unreadable" };
    }
  }

  hasRepositoryResults(repoId: string): boolean {
    const resultsPath = this.containedResultsPath(repoId);
    return resultsPath !== null && fs.existsSync(resultsPath);
  }

  listResultIds(): string[] {
    if (!fs.existsSync(this.resultsDir)) return [];
    return fs
      .readdirSync(this.resultsDir)
      .filter((entry) => entry.endsWith(RESULTS_EXTENSION))
      .map((entry) => entry.slice(0, -RESULTS_EXTENSION.length))
      .sort();
  }
}

export function createRepositoryStore(
  cwd: string,
  explicitConfigPath?: string,
  logger?: Logger
): RepositoryStore {
  const { config } = loadConfig(cwd, explicitConfigPath);
  return new RepositoryStore({
    baseDir: cwd,
    repositoriesFile: config.repositoriesFile,
    resultsDir: config.resultsDir,
    logger: logger ?? createConsoleLogger({ quiet: config.quiet }),
  });
}
