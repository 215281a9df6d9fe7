/**
 * Repository workspace preparation: clone or reuse, then check out the target branch
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { errorMessage } from "../runtime/errors.js";

const execFileAsync = promisify(execFile);

export interface PrepareRequest {
  repoPath?: string;
  repoUrl?: string;
  branch?: string;
}

export interface PreparedWorkspace {
  path: string;
  log: string[];
}

export interface RepoPreparer {
  /** Null when the request names no repository */
  prepare(request: PrepareRequest): Promise<PreparedWorkspace | null>;
}

/**
 * Runs git with the given arguments; resolves with stdout
 */
export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export const defaultGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync("git", args, { cwd, maxBuffer: 10 * 1024 * 1024 });
  return stdout;
};

function expandHome(p: string): string {
  return p === "~" || p.startsWith("~/") ? path.join(os.homedir(), p.slice(1)) : p;
}

/**
 * Last path segment of a clone URL without ".git"
 */
export function slugFromUrl(repoUrl: string): string {
  const last = repoUrl.replace(/\/+$/, "").split(/[/:]/).pop() ?? "";
  const slug = last.endsWith(".git") ? last.slice(0, -4) : last;
  return slug || "repo";
}

export function resolveWorkspacePath(workspaceRoot: string, request: PrepareRequest): string {
  if (request.repoPath) return path.resolve(expandHome(request.repoPath));
  return path.resolve(workspaceRoot, request.repoUrl ? slugFromUrl(request.repoUrl) : "repo");
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export class GitRepoPreparer implements RepoPreparer {
  constructor(
    private readonly workspaceRoot: string,
    private readonly git: GitRunner = defaultGit,
  ) {}

  async prepare(request: PrepareRequest): Promise<PreparedWorkspace | null> {
    if (!request.repoPath && !request.repoUrl) return null;

    const resolved = resolveWorkspacePath(this.workspaceRoot, request);
    const log: string[] = [];

    if (await exists(resolved)) {
      log.push(`Using existing repo at ${resolved}`);
    } else {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      if (request.repoUrl) {
        try {
          await this.git(["clone", request.repoUrl, resolved], path.dirname(resolved));
          log.push(`Cloned ${request.repoUrl} into ${resolved}`);
        } catch (error) {
          log.push(`Clone of ${request.repoUrl} failed: ${errorMessage(error)}`);
          await fs.mkdir(resolved, { recursive: true });
        }
      } else {
        await fs.mkdir(resolved, { recursive: true });
        log.push(`Initialized empty workspace at ${resolved}`);
      }
    }

    const branch = request.branch;
    if (branch) {
      if (await exists(path.join(resolved, ".git"))) {
        log.push(await this.checkout(resolved, branch));
      } else {
        log.push(`Skipping checkout: ${resolved} is not a git repo yet (branch=${branch}).`);
      }
    }

    return { path: resolved, log };
  }

  private async checkout(repo: string, branch: string): Promise<string> {
    try {
      await this.git(["checkout", branch], repo);
      return `Checked out ${branch}`;
    } catch {
      try {
        await this.git(["checkout", "-b", branch], repo);
        return `Created branch ${branch}`;
      } catch (error) {
        return `Checkout of ${branch} failed: ${errorMessage(error)}`;
      }
    }
  }
}
