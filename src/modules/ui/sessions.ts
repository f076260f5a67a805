/**
 * Session callback registry: maps the custom ids of live components to the
 * closure that handles them. The component handlers in `src/components` only
 * filter on `has()` and dispatch with `invoke()`.
 */
import type { ComponentContext, ModalContext } from "seyfert";
import { v4 as uuidv4 } from "uuid";

export type SessionCallback<C> = (ctx: C) => unknown | Promise<unknown>;

/** Component tokens stop working after 15 minutes on Discord's side. */
export const DEFAULT_SESSION_TTL_MS = 15 * 60 * 1000;

interface Entry<C> {
  callback: SessionCallback<C>;
  expiresAt: number;
}

/** Builds a custom id; `unique` appends a random suffix. Discord caps ids at 100 chars. */
export function makeID(name: string, unique = true): string {
  const id = unique ? `${name}:${uuidv4().slice(0, 8)}` : name;
  return id.slice(0, 100);
}

export class SessionRegistry<C> {
  private readonly entries = new Map<string, Entry<C>>();

  /** Registers `callback` under `id` and returns the id to put on the component. */
  register(id: string, callback: SessionCallback<C>, ttlMs = DEFAULT_SESSION_TTL_MS): string {
    this.entries.set(id, { callback, expiresAt: Date.now() + ttlMs });
    return id;
  }

  has(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(id);
      return false;
    }
    return true;
  }

  /** Runs the callback for `id`; resolves `false` when none is live. */
  async invoke(id: string, ctx: C): Promise<boolean> {
    if (!this.has(id)) return false;
    const entry = this.entries.get(id);
    if (!entry) return false;
    await entry.callback(ctx);
    return true;
  }

  release(...ids: string[]): void {
    for (const id of ids) this.entries.delete(id);
  }

  get size(): number {
    return this.entries.size;
  }
}

export const buttonSessions = new SessionRegistry<ComponentContext<"Button">>();
export const selectSessions = new SessionRegistry<ComponentContext<"StringSelect">>();
export const modalSessions = new SessionRegistry<ModalContext>();
