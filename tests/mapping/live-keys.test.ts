import { describe, expect, it } from 'vitest'

import { compileMappingSpec } from '~/mapping/compile'
import {
  collectLiveKeys,
  extractLiveKeys,
  getLiveSettings,
} from '~/mapping/live-keys'

describe('extractLiveKeys', () => {
  it('should collect bare keys, conditions and values', () => {
    const keys = extractLiveKeys({
      a: 'k1',
      b: { condition: 'k2', value: 'k3' },
    })

    expect([...keys]).toEqual(['k1', 'k2', 'k3'])
  })

  it('should descend into composite values and nested maps', () => {
    const keys = extractLiveKeys({
      spacing: {
        condition: 'has_spacing',
        value: { desktop: { value: 'gap' }, mobile: 'gap_mobile' },
      },
      columns: { desktop: 'columns', tablet: { value: 'columns_tablet' } },
      lenis: { condition: 'smooth', lerp: 'lerp_value' },
    })

    expect([...keys].sort()).toEqual([
      'columns',
      'columns_tablet',
      'gap',
      'gap_mobile',
      'has_spacing',
      'lerp_value',
      'smooth',
    ])
  })

  it('should return an empty set for an empty spec', () => {
    expect(extractLiveKeys({}).size).toBe(0)
  })
})

describe('collectLiveKeys', () => {
  it('should add into the given set', () => {
    const keys = new Set(['existing'])

    const result = collectLiveKeys(compileMappingSpec({ a: 'k1' }), keys)

    expect(result).toBe(keys)
    expect([...keys]).toEqual(['existing', 'k1'])
  })
})

describe('getLiveSettings', () => {
  it('should append additional settings after the mapping keys', () => {
    expect(
      getLiveSettings({ option1: 'key1' }, ['additional_key1', 'additional_key2']),
    ).toEqual(['key1', 'additional_key1', 'additional_key2'])
  })

  it('should remove duplicates keeping the first position', () => {
    expect(
      getLiveSettings({ first: 'dup', second: 'dup' }, ['dup', 'unique']),
    ).toEqual(['dup', 'unique'])
  })

  it('should default to no keys', () => {
    expect(getLiveSettings()).toEqual([])
  })
})
