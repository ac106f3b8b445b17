import { z } from 'zod'
import type { Db } from './db'
import categoryData from '../../data/inventory-categories.json'

const categoryNode = z.object({
  code: z.string(),
  name: z.string(),
  icon: z.string(),
  sort_order: z.number().int(),
})

const categorySeedSchema = z.array(
  categoryNode.extend({ subcategories: z.array(categoryNode) })
)

export type CategorySeed = z.infer<typeof categorySeedSchema>

export const CATEGORY_SEED: CategorySeed = categorySeedSchema.parse(categoryData)

export type InventoryCategory = {
  id: number
  code: string
  name: string
  icon: string | null
  parent_id: number | null
  is_active: boolean
  sort_order: number
}

export type CategoryTreeNode = InventoryCategory & { subcategories: InventoryCategory[] }

// Legacy codes from before the category tree existed
const LEGACY_CATEGORY_ALIASES: Record<string, string> = {
  palomas: 'coloms',
  basura: 'contenidors',
  perros: 'canis',
  material_deteriorat: 'mobiliari_deteriorat',
  mobiliari_urba: 'mobiliari_deteriorat',
}

const LEGACY_SUBCATEGORY_ALIASES: Record<string, string | null> = {
  nido: 'niu',
  excremento: 'excrement',
  plumas: 'ploma',
  vertidos: 'abocaments',
  // Overflowing containers are no longer inventory items
  escombreries_desbordades: null,
  basura_desbordada: null,
  otro: null,
}

const MAIN_CODES = new Set(CATEGORY_SEED.map(c => c.code))

/**
 * Current main category code for a legacy code, or null when there is none.
 */
export function mapLegacyCategory(code: string | null | undefined): string | null {
  if (!code) return null
  if (Object.hasOwn(LEGACY_CATEGORY_ALIASES, code)) return LEGACY_CATEGORY_ALIASES[code]
  return MAIN_CODES.has(code) ? code : null
}

export function mapLegacySubcategory(code: string | null | undefined): string | null {
  if (!code) return null
  if (Object.hasOwn(LEGACY_SUBCATEGORY_ALIASES, code)) return LEGACY_SUBCATEGORY_ALIASES[code]
  return code
}

/**
 * Upsert the category tree. Safe to run repeatedly; updates name, icon
 * and order of existing rows.
 */
export async function seedCategories(db: Db, createdBy: number | null = null) {
  let created = 0
  let updated = 0

  await db.transaction(async tx => {
    for (const main of CATEGORY_SEED) {
      const [parent] = await tx.query<{ id: number; inserted: boolean }>(
        `INSERT INTO inventory_categories (code, name, icon, parent_id, sort_order, created_by)
         VALUES ($1, $2, $3, NULL, $4, $5)
         ON CONFLICT ((COALESCE(parent_id, 0)), code)
         DO UPDATE SET name = EXCLUDED.name, icon = EXCLUDED.icon, sort_order = EXCLUDED.sort_order
         RETURNING id, (xmax = 0) AS inserted`,
        [main.code, main.name, main.icon, main.sort_order, createdBy]
      )
      if (parent.inserted) created++
      else updated++

      for (const sub of main.subcategories) {
        const [row] = await tx.query<{ inserted: boolean }>(
          `INSERT INTO inventory_categories (code, name, icon, parent_id, sort_order, created_by)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT ((COALESCE(parent_id, 0)), code)
           DO UPDATE SET name = EXCLUDED.name, icon = EXCLUDED.icon, sort_order = EXCLUDED.sort_order
           RETURNING (xmax = 0) AS inserted`,
          [sub.code, sub.name, sub.icon, parent.id, sub.sort_order, createdBy]
        )
        if (row.inserted) created++
        else updated++
      }
    }
  })

  console.log(`[categories] Seed complete: ${created} created, ${updated} updated`)
  return { created, updated }
}

export async function listCategoryTree(db: Db, includeInactive = false): Promise<CategoryTreeNode[]> {
  const rows = await db.query<InventoryCategory>(
    `SELECT id, code, name, icon, parent_id, is_active, sort_order
     FROM inventory_categories
     WHERE $1::boolean OR is_active
     ORDER BY sort_order, code`,
    [includeInactive]
  )
  return buildCategoryTree(rows)
}

export function buildCategoryTree(rows: InventoryCategory[]): CategoryTreeNode[] {
  const tree = rows
    .filter(r => r.parent_id === null)
    .map((r): CategoryTreeNode => ({ ...r, subcategories: [] }))
  const byId = new Map(tree.map(node => [node.id, node]))
  for (const row of rows) {
    if (row.parent_id !== null) byId.get(row.parent_id)?.subcategories.push(row)
  }
  return tree
}

/**
 * Resolve main and sub category ids by code. The subcategory must sit
 * under that main category unless `anyParent` is set, which legacy
 * migration uses to find a subcategory filed under another parent.
 */
export async function resolveCategoryIds(
  db: Db,
  mainCode: string,
  subCode: string | null,
  { anyParent = false }: { anyParent?: boolean } = {}
): Promise<{ mainId: number | null; subId: number | null }> {
  const [main] = await db.query<{ id: number }>(
    'SELECT id FROM inventory_categories WHERE code = $1 AND parent_id IS NULL',
    [mainCode]
  )
  if (!main) return { mainId: null, subId: null }
  if (!subCode) return { mainId: main.id, subId: null }

  const [sub] = anyParent
    ? await db.query<{ id: number }>(
        `SELECT id FROM inventory_categories
         WHERE code = $1 AND parent_id IS NOT NULL
         ORDER BY (parent_id = $2) DESC, id
         LIMIT 1`,
        [subCode, main.id]
      )
    : await db.query<{ id: number }>(
        'SELECT id FROM inventory_categories WHERE code = $1 AND parent_id = $2',
        [subCode, main.id]
      )
  return { mainId: main.id, subId: sub?.id ?? null }
}

export async function attachCategories(db: Db, itemId: number, mainId: number, subId: number | null) {
  await db.query(
    `INSERT INTO inventory_item_categories (item_id, category_id, is_primary)
     VALUES ($1, $2, TRUE) ON CONFLICT (item_id, category_id) DO NOTHING`,
    [itemId, mainId]
  )
  if (subId !== null) {
    await db.query(
      `INSERT INTO inventory_item_categories (item_id, category_id, is_primary)
       VALUES ($1, $2, FALSE) ON CONFLICT (item_id, category_id) DO NOTHING`,
      [itemId, subId]
    )
  }
}

export type CategoryMigrationResult = {
  migrated: number
  skipped: number
  errors: string[]
}

/**
 * Move items from the legacy category/subcategory columns onto the
 * relational category tree. Items that already have relations are skipped.
 */
export async function migrateItemsToCategories(
  db: Db,
  { dryRun = false }: { dryRun?: boolean } = {}
): Promise<CategoryMigrationResult> {
  const items = await db.query<{ id: number; category: string | null; subcategory: string | null; relations: number }>(
    `SELECT i.id, i.category, i.subcategory,
            (SELECT COUNT(*)::int FROM inventory_item_categories c WHERE c.item_id = i.id) AS relations
     FROM inventory_items i ORDER BY i.id`
  )

  const result: CategoryMigrationResult = { migrated: 0, skipped: 0, errors: [] }

  for (const item of items) {
    if (item.relations > 0) {
      result.skipped++
      continue
    }

    const mainCode = mapLegacyCategory(item.category)
    if (!mainCode) {
      result.errors.push(`Item ${item.id}: category '${item.category}' has no mapping`)
      continue
    }

    try {
      const { mainId, subId } = await resolveCategoryIds(db, mainCode, mapLegacySubcategory(item.subcategory), {
        anyParent: true,
      })
      if (mainId === null) {
        result.errors.push(`Item ${item.id}: category '${mainCode}' not found`)
        continue
      }
      if (!dryRun) await attachCategories(db, item.id, mainId, subId)
      result.migrated++
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      result.errors.push(`Item ${item.id}: ${message}`)
    }
  }

  console.log(
    `[categories] Migration ${dryRun ? '(dry run) ' : ''}done: ${result.migrated} migrated, ` +
    `${result.skipped} skipped, ${result.errors.length} errors`
  )
  return result
}
