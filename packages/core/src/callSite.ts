/**
 * Call-site identity resolution
 *
 * A call is identified within its enclosing group either by position
 * (call-site id + nth occurrence in this pass) or by a caller-chosen key
 * (call-site id + key). Identities are turned into slot keys that the
 * slot table matches across passes.
 */

import { UsageError } from './errors.js';
import type { CallIdentity, CallSiteKey } from './types.js';

/** Slot namespaces, so a group and a value at the same call site never collide */
export type SlotKind = 'group' | 'state' | 'changed';

const KIND_PREFIX: Record<SlotKind, string> = {
  group: 'g',
  state: 's',
  changed: 'c',
};

const FORBIDDEN_CHARS = ['/', '[', ']', '#'];

/** Call-site ids starting with this are used by the cache itself */
const RESERVED_PREFIX = '@';

export function assertValidCallSite(callSite: string): string {
  if (typeof callSite !== 'string') {
    throw new UsageError('Call-site id must be a string');
  }
  const trimmed = callSite.trim();
  if (!trimmed) {
    throw new UsageError('Call-site id must be a non-empty string');
  }
  if (callSite !== trimmed) {
    throw new UsageError(`Call-site id "${callSite}" must not have leading/trailing whitespace`);
  }
  if (callSite.startsWith(RESERVED_PREFIX)) {
    throw new UsageError(`Call-site id "${callSite}" must not start with "${RESERVED_PREFIX}"`);
  }
  const forbidden = FORBIDDEN_CHARS.find((ch) => callSite.includes(ch));
  if (forbidden) {
    throw new UsageError(`Call-site id "${callSite}" must not contain "${forbidden}"`);
  }
  return callSite;
}

function assertValidKey(callSite: string, key: CallSiteKey): CallSiteKey {
  if (typeof key === 'number') {
    if (!Number.isFinite(key)) {
      throw new UsageError(`Key for "${callSite}" must be a finite number`);
    }
    return key;
  }
  if (typeof key !== 'string') {
    throw new UsageError(`Key for "${callSite}" must be a string or a number`);
  }
  return key;
}

/**
 * Slot key stored in the table. Number and string keys never collide (`1` vs `"1"`).
 */
export function slotKeyOf(kind: SlotKind, identity: CallIdentity): string {
  const prefix = KIND_PREFIX[kind];
  if (identity.mode === 'positional') {
    return `${prefix}:${identity.callSite}#${identity.ordinal}`;
  }
  const keyPart = typeof identity.key === 'number' ? `n:${identity.key}` : `s:${identity.key}`;
  return `${prefix}:${identity.callSite}[${keyPart}]`;
}

/**
 * Readable label: `row`, `row#2` or `row[B]`
 */
export function identityLabel(identity: CallIdentity): string {
  if (identity.mode === 'keyed') {
    return `${identity.callSite}[${identity.key}]`;
  }
  return identity.ordinal === 0 ? identity.callSite : `${identity.callSite}#${identity.ordinal}`;
}

export interface ResolvedCall {
  identity: CallIdentity;
  slotKey: string;
}

/**
 * Per-group resolver state for one pass: occurrence counters and the keys
 * already claimed by earlier calls.
 */
export class CallSiteResolver {
  private readonly ordinals = new Map<string, number>();
  private readonly claimed = new Set<string>();

  resolve(kind: SlotKind, callSite: string, key?: CallSiteKey): ResolvedCall {
    return this.claim(kind, assertValidCallSite(callSite), key);
  }

  /**
   * Positional identity for a call the cache makes on its own behalf
   * (`@args`). User call sites can never collide with it.
   */
  resolveReserved(kind: SlotKind, name: string): ResolvedCall {
    return this.claim(kind, `${RESERVED_PREFIX}${name}`);
  }

  private claim(kind: SlotKind, callSite: string, key?: CallSiteKey): ResolvedCall {
    let identity: CallIdentity;
    if (key === undefined) {
      const counterKey = `${kind}:${callSite}`;
      const ordinal = this.ordinals.get(counterKey) ?? 0;
      this.ordinals.set(counterKey, ordinal + 1);
      identity = { mode: 'positional', callSite, ordinal };
    } else {
      identity = { mode: 'keyed', callSite, key: assertValidKey(callSite, key) };
    }

    const slotKey = slotKeyOf(kind, identity);
    if (this.claimed.has(slotKey)) {
      throw new UsageError(
        `Duplicate call-site key ${identityLabel(identity)} (${kind}) within one group`
      );
    }
    this.claimed.add(slotKey);
    return { identity, slotKey };
  }
}
