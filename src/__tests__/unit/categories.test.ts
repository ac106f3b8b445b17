import { describe, it, expect } from 'vitest'
import {
  buildCategoryTree,
  CATEGORY_SEED,
  mapLegacyCategory,
  mapLegacySubcategory,
  migrateItemsToCategories,
  resolveCategoryIds,
  seedCategories,
  type InventoryCategory,
} from '@/lib/categories'
import { createMockDb } from '../helpers/mock-db'

const MAIN_IDS: Record<string, number> = { coloms: 10, contenidors: 20 }
const SUBS: Record<string, { id: number; parent: number }> = {
  niu: { id: 11, parent: 10 },
  excrement: { id: 12, parent: 10 },
  abocaments: { id: 21, parent: 20 },
}

function categoryDb(items: Record<string, unknown>[] = []) {
  return createMockDb([
    [/FROM inventory_items i/, items],
    [/parent_id IS NULL/, params => {
      const id = MAIN_IDS[String(params[0])]
      return id ? [{ id }] : []
    }],
    [/parent_id = \$2/, params => {
      const sub = SUBS[String(params[0])]
      return sub && sub.parent === params[1] ? [{ id: sub.id }] : []
    }],
    [/parent_id IS NOT NULL/, params => {
      const sub = SUBS[String(params[0])]
      return sub ? [{ id: sub.id }] : []
    }],
  ])
}

describe('legacy category mapping', () => {
  it('maps old main codes to the current ones', () => {
    expect(mapLegacyCategory('palomas')).toBe('coloms')
    expect(mapLegacyCategory('basura')).toBe('contenidors')
    expect(mapLegacyCategory('mobiliari_urba')).toBe('mobiliari_deteriorat')
  })

  it('keeps current codes and drops unknown ones', () => {
    expect(mapLegacyCategory('vegetacio')).toBe('vegetacio')
    expect(mapLegacyCategory('unknown')).toBeNull()
    expect(mapLegacyCategory(null)).toBeNull()
  })

  it('maps old subcategories and drops retired ones', () => {
    expect(mapLegacySubcategory('nido')).toBe('niu')
    expect(mapLegacySubcategory('escombreries_desbordades')).toBeNull()
    expect(mapLegacySubcategory('bancs')).toBe('bancs')
    expect(mapLegacySubcategory('')).toBeNull()
  })
})

describe('CATEGORY_SEED', () => {
  it('loads the category tree from the data file', () => {
    expect(CATEGORY_SEED.map(c => c.code)).toEqual([
      'coloms',
      'contenidors',
      'canis',
      'mobiliari_deteriorat',
      'bruticia',
      'vandalisme',
      'vegetacio',
      'infraestructura',
    ])
    expect(CATEGORY_SEED.flatMap(c => c.subcategories)).toHaveLength(23)
  })
})

describe('buildCategoryTree', () => {
  it('nests subcategories under their parent', () => {
    const row = (id: number, code: string, parent_id: number | null): InventoryCategory => ({
      id,
      code,
      name: code,
      icon: null,
      parent_id,
      is_active: true,
      sort_order: id,
    })

    const tree = buildCategoryTree([row(1, 'coloms', null), row(2, 'niu', 1), row(3, 'canis', null), row(4, 'orphan', 99)])

    expect(tree.map(n => [n.code, n.subcategories.map(s => s.code)])).toEqual([
      ['coloms', ['niu']],
      ['canis', []],
    ])
  })
})

describe('seedCategories', () => {
  it('upserts every main category and subcategory', async () => {
    let nextId = 0
    const { db, callsMatching } = createMockDb([
      [/INSERT INTO inventory_categories/, () => [{ id: ++nextId, inserted: nextId > 2 }]],
    ])

    const result = await seedCategories(db, 1)

    expect(result).toEqual({ created: 29, updated: 2 })
    const inserts = callsMatching(/INSERT INTO inventory_categories/)
    expect(inserts[0].params).toEqual(['coloms', 'Coloms', 'fa-dove', 1, 1])
    expect(inserts[1].params).toEqual(['niu', 'Niu', 'fa-home', 1, 1, 1])
  })
})

describe('resolveCategoryIds', () => {
  it('resolves main and sub ids', async () => {
    const { db } = categoryDb()
    expect(await resolveCategoryIds(db, 'coloms', 'niu')).toEqual({ mainId: 10, subId: 11 })
    expect(await resolveCategoryIds(db, 'coloms', null)).toEqual({ mainId: 10, subId: null })
    expect(await resolveCategoryIds(db, 'coloms', 'nothing')).toEqual({ mainId: 10, subId: null })
  })

  it('ignores a subcategory filed under another category', async () => {
    const { db, calls } = categoryDb()
    expect(await resolveCategoryIds(db, 'coloms', 'abocaments')).toEqual({ mainId: 10, subId: null })
    expect(calls[1].params).toEqual(['abocaments', 10])
  })

  it('finds it under any parent when asked to', async () => {
    const { db } = categoryDb()
    expect(await resolveCategoryIds(db, 'coloms', 'abocaments', { anyParent: true })).toEqual({ mainId: 10, subId: 21 })
  })

  it('returns nulls for an unknown main category', async () => {
    const { db, calls } = categoryDb()
    expect(await resolveCategoryIds(db, 'missing', 'niu')).toEqual({ mainId: null, subId: null })
    expect(calls).toHaveLength(1)
  })
})

describe('migrateItemsToCategories', () => {
  const items = [
    { id: 1, category: 'palomas', subcategory: 'nido', relations: 0 },
    { id: 2, category: 'coloms', subcategory: null, relations: 2 },
    { id: 3, category: 'unknown', subcategory: null, relations: 0 },
    { id: 4, category: 'basura', subcategory: 'escombreries_desbordades', relations: 0 },
  ]

  it('attaches mapped categories to items without relations', async () => {
    const { db, callsMatching } = categoryDb(items)

    const result = await migrateItemsToCategories(db)

    expect(result).toEqual({
      migrated: 2,
      skipped: 1,
      errors: ["Item 3: category 'unknown' has no mapping"],
    })
    expect(callsMatching(/INSERT INTO inventory_item_categories/).map(c => c.params)).toEqual([
      [1, 10],
      [1, 11],
      [4, 20],
    ])
  })

  it('writes nothing on a dry run', async () => {
    const { db, callsMatching } = categoryDb(items)

    const result = await migrateItemsToCategories(db, { dryRun: true })

    expect(result.migrated).toBe(2)
    expect(callsMatching(/INSERT/)).toHaveLength(0)
  })
})
