import { describe, it, expect } from 'vitest'
import { classifyAll } from '../../src/engine/classify'
import { MissingFactError } from '../../src/model/errors'
import { createFactSet } from '../../src/model/facts'
import { ageTree } from '../fixtures/trees'

describe('classifyAll', () => {
  const tree = ageTree()

  it('groups items by outcome, keeping input order', () => {
    const items = [
      createFactSet({ age: 20, name: 'first' }),
      createFactSet({ age: 10, name: 'second' }),
      createFactSet({ age: 30, name: 'third' }),
    ]
    const groups = classifyAll(tree, items)

    expect([...groups.keys()]).toEqual(['adult', 'minor'])
    expect(groups.get('adult')).toEqual([items[0], items[2]])
    expect(groups.get('minor')).toEqual([items[1]])
  })

  it('leaves out outcomes no item reached', () => {
    const groups = classifyAll(tree, [createFactSet({ age: 40 })])
    expect(groups.has('minor')).toBe(false)
  })

  it('returns an empty map for no items', () => {
    expect(classifyAll(tree, []).size).toBe(0)
  })

  it('propagates an item error', () => {
    expect(() => classifyAll(tree, [createFactSet({ age: 40 }), createFactSet({})])).toThrow(MissingFactError)
  })
})
