/**
 * Repository checkpoint: git HEAD plus a hash over tracked files and the
 * working-tree status. A stored summary is stale once either one moves.
 */

import { createHash } from "node:crypto";
import type { GitRunner } from "../execution/workspace.js";
import { defaultGit } from "../execution/workspace.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { errorMessage } from "../runtime/errors.js";
import type { RepoCheckpoint } from "./store.js";

/** Changed files listed in the bundle */
export const MAX_DIFF_FILES = 20;

export interface RepoState extends RepoCheckpoint {
  /** Files changed since the stored head, or uncommitted changes without one */
  diffFiles: string[];
}

export interface RepoStateOptions {
  /** Head recorded by the last run on the workstream */
  baselineHead?: string | null;
  git?: GitRunner;
  logger?: VteamLogger;
}

/**
 * Git state of `repoPath`. Each field is null when its git command fails,
 * e.g. outside a repository.
 */
export async function computeRepoState(repoPath: string, options: RepoStateOptions = {}): Promise<RepoState> {
  const git = options.git ?? defaultGit;
  const logger = options.logger ?? createSilentLogger();
  const run = async (args: string[]): Promise<string | null> => {
    try {
      return await git(args, repoPath);
    } catch (error) {
      logger.debug("git command failed", { args: args.join(" "), repoPath, error: errorMessage(error) });
      return null;
    }
  };

  const head = (await run(["rev-parse", "HEAD"]))?.trim() || null;
  const files = await run(["ls-files", "-z"]);
  const status = await run(["status", "--porcelain"]);
  const trackedFilesHash =
    files === null && status === null
      ? null
      : createHash("sha256").update(`${files ?? ""}\n${status ?? ""}`).digest("hex");

  let diffFiles: string[];
  if (options.baselineHead && head) {
    const diff = (await run(["diff", "--name-only", `${options.baselineHead}..HEAD`])) ?? "";
    diffFiles = diff
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  } else {
    diffFiles = (status ?? "")
      .split("\n")
      .filter((line) => line.trim())
      .map((line) => line.slice(3));
  }

  return { gitHead: head, trackedFilesHash, diffFiles: diffFiles.slice(0, MAX_DIFF_FILES) };
}

/**
 * True when the stored checkpoint and the current state disagree on a
 * field both of them know
 */
export function isStale(stored: RepoCheckpoint, current: RepoCheckpoint): boolean {
  if (stored.gitHead && current.gitHead && stored.gitHead !== current.gitHead) return true;
  return Boolean(
    stored.trackedFilesHash && current.trackedFilesHash && stored.trackedFilesHash !== current.trackedFilesHash,
  );
}

export function checkpointLine(state: RepoCheckpoint, stale: boolean): string {
  const head = state.gitHead ?? "unknown";
  const tracked = state.trackedFilesHash ?? "unknown";
  return `head=${head} tracked_hash=${tracked} status=${stale ? "STALE" : "fresh"}`;
}
