/**
 * Stable coding-tool sessions per role or phase. Session ids derive from the
 * workstream key so later runs on the same repo, branch and workstream land
 * in the same session.
 */

import { createHash } from "node:crypto";
import type { ContextKey, ContextMode, ContextStore, SessionInfo } from "../context/store.js";
import { slugify } from "../context/store.js";

export function sessionIdFor(mode: ContextMode, key: ContextKey, name: string): string {
  const digest = createHash("sha1")
    .update(`${mode}|${key.repo}|${key.branch}|${key.workstreamId}|${name}`)
    .digest("hex")
    .slice(0, 12);
  return `sess_${digest}`;
}

export class SessionRegistry {
  private readonly cache = new Map<string, SessionInfo>();
  private loaded = false;

  constructor(
    readonly mode: ContextMode,
    readonly key: ContextKey,
    private readonly store?: ContextStore,
  ) {}

  /**
   * Session for a role or phase, created on first use
   */
  async acquire(name: string): Promise<SessionInfo> {
    await this.load();
    const existing = this.cache.get(name);
    if (existing) return existing;

    const info: SessionInfo = { ...this.identify(name), initialized: false };
    await this.save(name, info);
    return info;
  }

  /**
   * Id and name a session would get, without recording it
   */
  identify(name: string): Pick<SessionInfo, "sessionId" | "sessionName"> {
    return {
      sessionId: sessionIdFor(this.mode, this.key, name),
      sessionName: `${this.mode}-${slugify(name) || "session"}`,
    };
  }

  /**
   * Record that the one-time session-init message was sent
   */
  async markInitialized(name: string): Promise<SessionInfo> {
    const info = { ...(await this.acquire(name)), initialized: true };
    await this.save(name, info);
    return info;
  }

  private async load(): Promise<void> {
    if (this.loaded) return;
    this.loaded = true;
    if (!this.store) return;
    const stored = await this.store.getSessions(this.mode, this.key);
    for (const [name, info] of Object.entries(stored)) {
      this.cache.set(name, info);
    }
  }

  private async save(name: string, info: SessionInfo): Promise<void> {
    this.cache.set(name, info);
    if (this.store) {
      await this.store.saveSession(this.mode, this.key, name, info);
    }
  }
}
