import type { Db } from '../db'
import { assignRole, removeRole } from '../admin'
import { getConfig } from '../config'
import { ConflictError, NotFoundError } from '../errors'
import { geometryContains } from './polygon'
import { parseWkt, type Geometry } from './wkt'

export type SectionRow = {
  id: number
  code: string
  district_code: string
  name: string | null
  polygon: string
}

export type SectionFeature = {
  id: number
  code: string
  district_code: string
  district_name: string
  name: string
  full_code: string
  geometry: Geometry
}

export const fullCode = (section: Pick<SectionRow, 'district_code' | 'code'>) =>
  `${section.district_code}-${section.code}`

const SECTION_COLUMNS = 'id, code, district_code, name, polygon'

/**
 * First section whose polygon contains the point. Sections with an
 * unparseable polygon are skipped.
 */
export function findContainingSection<T extends Pick<SectionRow, 'id' | 'polygon'>>(
  sections: T[],
  lat: number,
  lng: number
): T | null {
  for (const section of sections) {
    if (!section.polygon) continue
    try {
      if (geometryContains(parseWkt(section.polygon), lat, lng)) return section
    } catch (error) {
      console.warn(`[geo] Skipping section ${section.id}: invalid polygon`, error)
    }
  }
  return null
}

/**
 * Locate the section containing a point.
 * PostGIS first, then in-process geometry over every section, else null.
 * Never throws. Must not run inside a transaction, since a failed
 * PostGIS call would abort it.
 */
export async function findSectionForPoint(db: Db, lat: number, lng: number): Promise<SectionRow | null> {
  if (getConfig().postgisEnabled) {
    try {
      const rows = await db.query<SectionRow>(
        `SELECT ${SECTION_COLUMNS} FROM sections
         WHERE ST_Contains(ST_GeomFromText(polygon, 4326), ST_SetSRID(ST_MakePoint($1, $2), 4326))
         LIMIT 1`,
        [lng, lat]
      )
      if (rows[0]) return rows[0]
    } catch (error) {
      console.warn('[geo] PostGIS section lookup failed, using in-process fallback:', error)
    }
  }

  try {
    const sections = await db.query<SectionRow>(`SELECT ${SECTION_COLUMNS} FROM sections ORDER BY id`)
    return findContainingSection(sections, lat, lng)
  } catch (error) {
    console.warn(`[geo] Section lookup failed for (${lat}, ${lng}):`, error)
    return null
  }
}

/** Sections with their district, as GeoJSON geometries for the map. */
export async function listSectionFeatures(db: Db): Promise<SectionFeature[]> {
  const rows = await db.query<SectionRow & { district_name: string }>(
    `SELECT s.id, s.code, s.district_code, s.name, s.polygon, d.name AS district_name
     FROM sections s JOIN districts d ON d.code = s.district_code
     ORDER BY s.district_code, s.code`
  )

  const features: SectionFeature[] = []
  for (const row of rows) {
    try {
      features.push({
        id: row.id,
        code: row.code,
        district_code: row.district_code,
        district_name: row.district_name,
        name: row.name || `Secció ${row.code}`,
        full_code: fullCode(row),
        geometry: parseWkt(row.polygon),
      })
    } catch (error) {
      console.warn(`[geo] Error parsing polygon for section ${row.id}:`, error)
    }
  }
  return features
}

export async function isSectionResponsible(db: Db, userId: number, sectionId: number | null): Promise<boolean> {
  if (sectionId === null) return false
  const rows = await db.query(
    'SELECT 1 FROM section_responsibles WHERE user_id = $1 AND section_id = $2',
    [userId, sectionId]
  )
  return rows.length > 0
}

export async function managedSectionIds(db: Db, userId: number): Promise<number[]> {
  const rows = await db.query<{ section_id: number }>(
    'SELECT section_id FROM section_responsibles WHERE user_id = $1 ORDER BY section_id',
    [userId]
  )
  return rows.map(r => r.section_id)
}

/**
 * Make a user responsible for a section. Also grants the
 * section_responsible role.
 */
export async function assignSectionResponsible(db: Db, userId: number, sectionId: number, assignedBy: number) {
  return db.transaction(async tx => {
    const [section] = await tx.query<{ id: number }>('SELECT id FROM sections WHERE id = $1', [sectionId])
    if (!section) throw new NotFoundError('Section not found')
    const [user] = await tx.query<{ id: number }>('SELECT id FROM users WHERE id = $1', [userId])
    if (!user) throw new NotFoundError('User not found')

    const inserted = await tx.query<{ id: number }>(
      `INSERT INTO section_responsibles (user_id, section_id, assigned_by) VALUES ($1, $2, $3)
       ON CONFLICT (user_id, section_id) DO NOTHING RETURNING id`,
      [userId, sectionId, assignedBy]
    )
    if (inserted.length === 0) throw new ConflictError('User is already responsible for this section')

    await assignRole(tx, userId, 'section_responsible')
    return inserted[0].id
  })
}

/** Drops the role once the user has no sections left. */
export async function unassignSectionResponsible(db: Db, userId: number, sectionId: number) {
  return db.transaction(async tx => {
    const removed = await tx.query(
      'DELETE FROM section_responsibles WHERE user_id = $1 AND section_id = $2 RETURNING id',
      [userId, sectionId]
    )
    if (removed.length === 0) throw new NotFoundError('Assignment not found')

    const remaining = await tx.query('SELECT 1 FROM section_responsibles WHERE user_id = $1 LIMIT 1', [userId])
    if (remaining.length === 0) await removeRole(tx, userId, 'section_responsible')
  })
}

export async function listSectionResponsibles(db: Db) {
  return db.query<{ id: number; user_id: number; email: string; username: string; section_id: number; full_code: string; assigned_at: Date }>(
    `SELECT sr.id, sr.user_id, u.email, u.username, sr.section_id,
            s.district_code || '-' || s.code AS full_code, sr.assigned_at
     FROM section_responsibles sr
     JOIN users u ON u.id = sr.user_id
     JOIN sections s ON s.id = sr.section_id
     ORDER BY s.district_code, s.code, u.username`
  )
}
