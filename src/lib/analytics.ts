import { NextResponse } from 'next/server'
import { z } from 'zod'
import type { Db } from './db'
import { mapLegacyCategory, mapLegacySubcategory } from './categories'

export const NO_SECTION = 'Sense secció'
export const OTHER_CATEGORIES = 'Altres'
export const TREND_CATEGORY_LIMIT = 5

const blankToNull = (value: unknown) => (value === '' || value === undefined ? null : value)
const optionalId = z.preprocess(blankToNull, z.coerce.number().int().positive().nullable())
const optionalCode = z.preprocess(blankToNull, z.string().trim().max(50).nullable())
const optionalDate = z.preprocess(
  blankToNull,
  z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD').nullable()
)

/** Report filters as they arrive in the query string. */
export const analyticsFilters = z
  .object({
    district_id: optionalId,
    section_id: optionalId,
    category: optionalCode,
    subcategory: optionalCode,
    date_from: optionalDate,
    date_to: optionalDate,
  })
  .transform(f => ({
    districtId: f.district_id,
    sectionId: f.section_id,
    category: f.category,
    subcategory: f.subcategory,
    dateFrom: f.date_from,
    dateTo: f.date_to,
  }))

export type AnalyticsFilters = z.output<typeof analyticsFilters>

export const parseAnalyticsFilters = (searchParams: URLSearchParams): AnalyticsFilters =>
  analyticsFilters.parse(Object.fromEntries(searchParams))

export type AnalyticsRow = {
  id: number
  category: string | null
  category_name: string | null
  subcategory: string | null
  subcategory_name: string | null
  description: string | null
  address: string | null
  latitude: number
  longitude: number
  importance_count: number
  resolved_count: number
  created_at: Date
  section_code: string | null
  section_name: string | null
  district_code: string | null
  district_name: string | null
}

/**
 * Items on the map matching the filters, ordered by district, section and
 * creation time. `dateTo` includes the whole day.
 */
export async function analyticsItems(db: Db, filters: Partial<AnalyticsFilters> = {}): Promise<AnalyticsRow[]> {
  const category = filters.category ? mapLegacyCategory(filters.category) ?? filters.category : null
  const subcategory = filters.subcategory ? mapLegacySubcategory(filters.subcategory) ?? filters.subcategory : null

  return db.query<AnalyticsRow>(
    `SELECT i.id,
            COALESCE(mc.code, i.category) AS category, mc.name AS category_name,
            COALESCE(sc.code, i.subcategory) AS subcategory, sc.name AS subcategory_name,
            i.description, i.address, i.latitude, i.longitude, i.importance_count, i.resolved_count,
            i.created_at, s.code AS section_code, s.name AS section_name,
            s.district_code, d.name AS district_name
     FROM inventory_items i
     LEFT JOIN inventory_item_categories mic ON mic.item_id = i.id AND mic.is_primary
     LEFT JOIN inventory_categories mc ON mc.id = mic.category_id
     LEFT JOIN inventory_item_categories sic ON sic.item_id = i.id AND NOT sic.is_primary
     LEFT JOIN inventory_categories sc ON sc.id = sic.category_id
     LEFT JOIN sections s ON s.id = i.section_id
     LEFT JOIN districts d ON d.code = s.district_code
     WHERE i.status = 'approved'
       AND ($1::int IS NULL OR d.id = $1)
       AND ($2::int IS NULL OR i.section_id = $2)
       AND ($3::text IS NULL OR COALESCE(mc.code, i.category) = $3)
       AND ($4::text IS NULL OR COALESCE(sc.code, i.subcategory) = $4)
       AND ($5::date IS NULL OR i.created_at >= $5::date)
       AND ($6::date IS NULL OR i.created_at < $6::date + 1)
     ORDER BY s.district_code NULLS LAST, s.code NULLS LAST, i.created_at`,
    [
      filters.districtId ?? null,
      filters.sectionId ?? null,
      category,
      subcategory,
      filters.dateFrom ?? null,
      filters.dateTo ?? null,
    ]
  )
}

export function categoryKey(row: Pick<AnalyticsRow, 'category' | 'subcategory'>): string {
  if (row.category && row.subcategory) return `${row.category}->${row.subcategory}`
  return row.category ?? 'no-category'
}

const categoryLabel = (row: AnalyticsRow) => row.category_name ?? row.category ?? ''

function zoneOf(row: AnalyticsRow) {
  if (!row.section_code || !row.district_code) {
    return { district: NO_SECTION, code: 'N/A', name: NO_SECTION }
  }
  return {
    district: row.district_name ?? `Districte ${row.district_code}`,
    code: `${row.district_code}-${row.section_code}`,
    name: row.section_name ?? `Secció ${row.section_code}`,
  }
}

export type ZoneSection = {
  code: string
  name: string
  total: number
  byCategory: Record<string, number>
  items: AnalyticsRow[]
}

export type ZoneReport = {
  total: number
  districts: { district: string; sections: ZoneSection[] }[]
}

/** Items grouped by district, then section, with a count per category pair. */
export function inventoryByZone(rows: AnalyticsRow[]): ZoneReport {
  const districts = new Map<string, Map<string, ZoneSection>>()

  for (const row of rows) {
    const zone = zoneOf(row)
    let sections = districts.get(zone.district)
    if (!sections) {
      sections = new Map()
      districts.set(zone.district, sections)
    }
    let section = sections.get(zone.code)
    if (!section) {
      section = { code: zone.code, name: zone.name, total: 0, byCategory: {}, items: [] }
      sections.set(zone.code, section)
    }

    const key = categoryKey(row)
    section.items.push(row)
    section.total += 1
    section.byCategory[key] = (section.byCategory[key] ?? 0) + 1
  }

  return {
    total: rows.length,
    districts: [...districts].map(([district, sections]) => ({ district, sections: [...sections.values()] })),
  }
}

export type TrendDay = { date: string; total: number; byCategory: Record<string, number> }

export type TrendReport = { categories: string[]; days: TrendDay[] }

/**
 * Items per day. Only the `limit` most reported categories keep their own
 * column; the rest are summed under "Altres".
 */
export function dailyTrends(rows: AnalyticsRow[], limit = TREND_CATEGORY_LIMIT): TrendReport {
  const days = new Map<string, TrendDay>()
  const totals = new Map<string, number>()

  for (const row of rows) {
    const date = row.created_at.toISOString().slice(0, 10)
    let day = days.get(date)
    if (!day) {
      day = { date, total: 0, byCategory: {} }
      days.set(date, day)
    }
    day.total += 1

    if (!row.category) continue
    const label = categoryLabel(row)
    day.byCategory[label] = (day.byCategory[label] ?? 0) + 1
    totals.set(label, (totals.get(label) ?? 0) + 1)
  }

  const top = [...totals]
    .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
    .slice(0, limit)
    .map(([label]) => label)
    .sort((a, b) => a.localeCompare(b))

  let hasOthers = false
  for (const day of days.values()) {
    let others = 0
    for (const [label, count] of Object.entries(day.byCategory)) {
      if (top.includes(label)) continue
      others += count
      delete day.byCategory[label]
    }
    if (others > 0) {
      day.byCategory[OTHER_CATEGORIES] = others
      hasOthers = true
    }
  }

  return {
    categories: hasOthers ? [...top, OTHER_CATEGORIES] : top,
    days: [...days.values()].sort((a, b) => a.date.localeCompare(b.date)),
  }
}

export type CategoryRanking = {
  key: string
  category: string
  categoryName: string
  subcategory: string | null
  subcategoryName: string | null
  total: number
  byZone: Record<string, number>
}

/** Category pairs by number of items, most reported first. Uncategorized items are left out. */
export function topCategories(rows: AnalyticsRow[]): CategoryRanking[] {
  const ranking = new Map<string, CategoryRanking>()

  for (const row of rows) {
    if (!row.category) continue
    const key = categoryKey(row)
    let entry = ranking.get(key)
    if (!entry) {
      entry = {
        key,
        category: row.category,
        categoryName: categoryLabel(row),
        subcategory: row.subcategory,
        subcategoryName: row.subcategory ? row.subcategory_name ?? row.subcategory : null,
        total: 0,
        byZone: {},
      }
      ranking.set(key, entry)
    }
    const zone = row.district_code && row.section_code ? `${row.district_code}-${row.section_code}` : NO_SECTION
    entry.total += 1
    entry.byZone[zone] = (entry.byZone[zone] ?? 0) + 1
  }

  return [...ranking.values()].sort((a, b) => b.total - a.total)
}

type CsvValue = string | number | null

function csvField(value: CsvValue): string {
  const text = value === null ? '' : String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export const toCsv = (rows: CsvValue[][]) => rows.map(row => row.map(csvField).join(',')).join('\n')

const timestamp = (date: Date) => date.toISOString().slice(0, 19).replace('T', ' ')

export function zoneReportCsv(report: ZoneReport): string {
  const rows: CsvValue[][] = [[
    'Districte', 'Secció', 'Codi Secció', 'Categoria', 'Subcategoria', 'Descripció',
    'Adreça', 'Latitud', 'Longitud', 'Importància', 'Resolts', 'Data Creació',
  ]]
  for (const { district, sections } of report.districts) {
    for (const section of sections) {
      for (const item of section.items) {
        rows.push([
          district,
          section.name,
          section.code,
          categoryLabel(item),
          item.subcategory_name ?? item.subcategory,
          item.description,
          item.address,
          item.latitude,
          item.longitude,
          item.importance_count,
          item.resolved_count,
          timestamp(item.created_at),
        ])
      }
    }
  }
  return toCsv(rows)
}

export function trendsCsv(report: TrendReport): string {
  return toCsv([
    ['Data', 'Total', ...report.categories],
    ...report.days.map(day => [day.date, day.total, ...report.categories.map(c => day.byCategory[c] ?? 0)]),
  ])
}

export function topCategoriesCsv(ranking: CategoryRanking[]): string {
  return toCsv([
    ['Categoria', 'Subcategoria', 'Total', 'Zones Afectades'],
    ...ranking.map(r => [r.categoryName, r.subcategoryName, r.total, Object.keys(r.byZone).length]),
  ])
}

export function csvResponse(body: string, name: string, now = new Date()) {
  return new NextResponse(body, {
    headers: {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${name}-${now.toISOString().slice(0, 10)}.csv"`,
    },
  })
}
