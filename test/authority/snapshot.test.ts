import { describe, it, expect } from 'vitest'
import { AuthorityStore } from '../../src/authority/store.js'
import { ManualClock } from '../../src/authority/clock.js'
import { parseSnapshot } from '../../src/authority/snapshot.js'
import { AuthorityError } from '../../src/authority/types.js'

function buildStore(): AuthorityStore {
  let next = 0
  const store = new AuthorityStore({ clock: new ManualClock(10), generateId: () => `t${++next}` })
  const root = store.mint({
    issuer: 'host',
    subject: 'agent',
    scope: ['mail.send', 'mail.read'],
    validity: { notBefore: 0, expiresAt: 100 },
  })
  store.delegate(root.id, { scope: ['mail.read'], validity: { notBefore: 10, expiresAt: 50 } })
  store.revoke(root.id)
  return store
}

describe('authority snapshots', () => {
  it('serializes tokens in a fixed shape', () => {
    const store = new AuthorityStore({ clock: new ManualClock(5), generateId: () => 'only' })
    store.mint({ issuer: 'host', subject: 'agent', scope: ['a'] })

    expect(store.toSnapshot()).toBe(
      '{"version":1,"tokens":[{"id":"only","issuer":"host","subject":"agent","scope":["a"],' +
        '"validity":{"notBefore":5,"expiresAt":null},"parentId":null,"revoked":false}]}'
    )
  })

  it('restores to a byte-identical snapshot', () => {
    const snapshot = buildStore().toSnapshot()
    const restored = AuthorityStore.fromSnapshot(snapshot, { clock: new ManualClock(10) })

    expect(restored.toSnapshot()).toBe(snapshot)
    expect(restored.validate('t2', 20)).toBe('revoked')
    expect(restored.lineage('t2')).toEqual(['t2', 't1'])
  })

  it.each([
    ['invalid JSON', '{'],
    ['a wrong version', '{"version":2,"tokens":[]}'],
    ['an unknown field', '{"version":1,"tokens":[],"extra":true}'],
  ])('rejects %s', (_name, json) => {
    expect(() => parseSnapshot(json)).toThrow(AuthorityError)
  })

  const record = (fields: Record<string, unknown>) => ({
    id: 'x',
    issuer: 'host',
    subject: 'agent',
    scope: ['a'],
    validity: { notBefore: 0, expiresAt: null },
    parentId: null,
    revoked: false,
    ...fields,
  })

  it('rejects a child that precedes its parent', () => {
    const json = JSON.stringify({
      version: 1,
      tokens: [record({ id: 'child', parentId: 'root' }), record({ id: 'root', scope: ['a', 'b'] })],
    })
    expect(() => parseSnapshot(json)).toThrow(
      'Token child references parent root that does not precede it'
    )
  })

  it('rejects a child that is not narrower than its parent', () => {
    const json = JSON.stringify({
      version: 1,
      tokens: [record({ id: 'root' }), record({ id: 'child', parentId: 'root' })],
    })
    expect(() => parseSnapshot(json)).toThrow('Token child is not narrower than its parent root')
  })

  it.each([
    ['an open-ended child window', { notBefore: 0, expiresAt: null }, { notBefore: 0, expiresAt: null }],
    ['a child window equal to the parent', { notBefore: 0, expiresAt: 100 }, { notBefore: 0, expiresAt: 100 }],
  ])('rejects %s', (_name, parentWindow, childWindow) => {
    const json = JSON.stringify({
      version: 1,
      tokens: [
        record({ id: 'root', scope: ['a', 'b'], validity: parentWindow }),
        record({ id: 'child', parentId: 'root', validity: childWindow }),
      ],
    })
    expect(() => parseSnapshot(json)).toThrow('Token child is not narrower than its parent root')
  })

  it('rejects duplicate IDs', () => {
    const json = JSON.stringify({ version: 1, tokens: [record({}), record({})] })
    expect(() => parseSnapshot(json)).toThrow('Duplicate token x in snapshot')
  })

  it('rejects duplicate scope resources', () => {
    const json = JSON.stringify({ version: 1, tokens: [record({ scope: ['a', 'a'] })] })
    expect(() => parseSnapshot(json)).toThrow('Token x has a malformed scope')
  })
})
