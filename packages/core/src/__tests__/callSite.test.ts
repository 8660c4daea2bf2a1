import { describe, it, expect } from 'vitest';
import { CallSiteResolver, assertValidCallSite, identityLabel, slotKeyOf } from '../callSite.js';
import { UsageError } from '../errors.js';

describe('assertValidCallSite', () => {
  it('should accept plain ids', () => {
    expect(assertValidCallSite('row')).toBe('row');
    expect(assertValidCallSite('row@2')).toBe('row@2');
  });

  it('should reject the reserved prefix', () => {
    expect(() => assertValidCallSite('@args')).toThrow('Call-site id "@args" must not start with "@"');
  });

  it('should reject empty and padded ids', () => {
    expect(() => assertValidCallSite('')).toThrow('non-empty');
    expect(() => assertValidCallSite(' row')).toThrow('leading/trailing whitespace');
  });

  it('should reject path characters', () => {
    expect(() => assertValidCallSite('a/b')).toThrow('must not contain "/"');
    expect(() => assertValidCallSite('row[1]')).toThrow('must not contain "["');
    expect(() => assertValidCallSite('row#1')).toThrow(UsageError);
  });
});

describe('slot keys and labels', () => {
  it('should keep number and string keys apart', () => {
    const numeric = slotKeyOf('group', { mode: 'keyed', callSite: 'row', key: 1 });
    const text = slotKeyOf('group', { mode: 'keyed', callSite: 'row', key: '1' });
    expect(numeric).toBe('g:row[n:1]');
    expect(text).toBe('g:row[s:1]');
  });

  it('should prefix by slot kind', () => {
    const identity = { mode: 'positional', callSite: 'x', ordinal: 2 } as const;
    expect(slotKeyOf('group', identity)).toBe('g:x#2');
    expect(slotKeyOf('state', identity)).toBe('s:x#2');
    expect(slotKeyOf('changed', identity)).toBe('c:x#2');
  });

  it('should render readable labels', () => {
    expect(identityLabel({ mode: 'positional', callSite: 'row', ordinal: 0 })).toBe('row');
    expect(identityLabel({ mode: 'positional', callSite: 'row', ordinal: 2 })).toBe('row#2');
    expect(identityLabel({ mode: 'keyed', callSite: 'row', key: 'B' })).toBe('row[B]');
  });
});

describe('CallSiteResolver', () => {
  it('should count positional occurrences per call site and kind', () => {
    const resolver = new CallSiteResolver();
    expect(resolver.resolve('group', 'item').slotKey).toBe('g:item#0');
    expect(resolver.resolve('group', 'item').slotKey).toBe('g:item#1');
    expect(resolver.resolve('state', 'item').slotKey).toBe('s:item#0');
    expect(resolver.resolve('group', 'other').slotKey).toBe('g:other#0');
  });

  it('should resolve reserved call sites apart from user ones', () => {
    const resolver = new CallSiteResolver();
    expect(resolver.resolveReserved('changed', 'args').slotKey).toBe('c:@args#0');
    expect(resolver.resolve('changed', 'args').slotKey).toBe('c:args#0');
  });

  it('should reject a key claimed twice within one group', () => {
    const resolver = new CallSiteResolver();
    resolver.resolve('group', 'row', 'A');
    expect(() => resolver.resolve('group', 'row', 'A')).toThrow(
      'Duplicate call-site key row[A] (group) within one group'
    );
  });

  it('should allow the same key under another kind', () => {
    const resolver = new CallSiteResolver();
    resolver.resolve('group', 'row', 'A');
    expect(resolver.resolve('state', 'row', 'A').slotKey).toBe('s:row[s:A]');
  });

  it('should reject non-finite numeric keys', () => {
    const resolver = new CallSiteResolver();
    expect(() => resolver.resolve('group', 'row', Number.NaN)).toThrow('finite number');
  });
});
