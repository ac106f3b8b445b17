/**
 * Import administrative zones (districts and census sections) from GeoJSON.
 *
 * Expects `districts.geojson` (optional) and `sections.geojson` in one
 * directory. District features carry `code` and `name`; section features
 * carry `district_code`, `code` and optionally `name`.
 */

import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import type { Db } from '../db'
import { refreshBoundary } from './boundary'
import { geometrySchema, toWkt, type Geometry } from './wkt'

const code = z.union([z.string().min(1), z.number()]).transform(value => String(value))

const sectionGeometry = geometrySchema.refine(g => g.coordinates.length > 0, 'Empty geometry')

const districtFeature = z.object({
  properties: z.object({ code, name: z.string().min(1) }),
})

const sectionFeature = z.object({
  properties: z.object({
    district_code: code,
    code,
    name: z.string().nullish(),
  }),
  geometry: sectionGeometry,
})

const collection = <T extends z.ZodTypeAny>(feature: T) =>
  z.object({ type: z.literal('FeatureCollection'), features: z.array(feature) })

export type DistrictInput = { code: string; name: string }
export type SectionInput = { districtCode: string; code: string; name: string | null; polygon: string }

export type ZoneImport = {
  districts: DistrictInput[]
  sections: SectionInput[]
}

export function parseZones(sectionsJson: unknown, districtsJson?: unknown): ZoneImport {
  const sections = collection(sectionFeature)
    .parse(sectionsJson)
    .features.map(f => {
      const geometry: Geometry = f.geometry
      return {
        districtCode: f.properties.district_code,
        code: f.properties.code,
        name: f.properties.name ?? null,
        polygon: toWkt(geometry),
      }
    })

  const districts = new Map<string, DistrictInput>()
  if (districtsJson !== undefined) {
    for (const f of collection(districtFeature).parse(districtsJson).features) {
      districts.set(f.properties.code, { code: f.properties.code, name: f.properties.name })
    }
  }
  // Districts referenced only by sections get a generic name
  for (const section of sections) {
    if (!districts.has(section.districtCode)) {
      districts.set(section.districtCode, { code: section.districtCode, name: `Districte ${section.districtCode}` })
    }
  }

  return { districts: [...districts.values()], sections }
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf8'))
}

export function readZoneDirectory(dir: string): ZoneImport {
  const sectionsFile = path.join(dir, 'sections.geojson')
  const districtsFile = path.join(dir, 'districts.geojson')
  if (!fs.existsSync(sectionsFile)) {
    throw new Error(`Missing ${sectionsFile}`)
  }
  return parseZones(
    readJson(sectionsFile),
    fs.existsSync(districtsFile) ? readJson(districtsFile) : undefined
  )
}

export async function saveZones(db: Db, zones: ZoneImport): Promise<{ districts: number; sections: number }> {
  await db.transaction(async tx => {
    for (const d of zones.districts) {
      await tx.query(
        `INSERT INTO districts (code, name) VALUES ($1, $2)
         ON CONFLICT (code) DO UPDATE SET name = EXCLUDED.name, updated_at = NOW()`,
        [d.code, d.name]
      )
    }
    for (const s of zones.sections) {
      await tx.query(
        `INSERT INTO sections (district_code, code, name, polygon) VALUES ($1, $2, $3, $4)
         ON CONFLICT (district_code, code)
         DO UPDATE SET name = EXCLUDED.name, polygon = EXCLUDED.polygon, updated_at = NOW()`,
        [s.districtCode, s.code, s.name, s.polygon]
      )
    }
  })

  await refreshBoundary(db)
  return { districts: zones.districts.length, sections: zones.sections.length }
}

export async function importZones(db: Db, dir: string) {
  const zones = readZoneDirectory(dir)
  const result = await saveZones(db, zones)
  console.log(`[geo] Imported ${result.districts} districts and ${result.sections} sections from ${dir}`)
  return result
}
