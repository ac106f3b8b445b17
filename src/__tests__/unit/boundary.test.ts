import { describe, it, expect } from 'vitest'
import {
  boundaryWithBounds,
  getOrCreateBoundary,
  insideFallbackBox,
  mergeSectionPolygons,
  pointIsInside,
} from '@/lib/geo/boundary'
import { createMockDb, failingQuery } from '../helpers/mock-db'

const CITY = 'POLYGON ((1 41, 1.4 41, 1.4 41.2, 1 41.2, 1 41))'

const storedBoundary = (polygon: string) => ({
  id: 1,
  name: 'Tarragona',
  polygon,
  calculated_at: new Date('2026-01-02T03:04:05Z'),
})

describe('insideFallbackBox', () => {
  it('accepts points inside the coarse box', () => {
    expect(insideFallbackBox(41.1189, 1.2445)).toBe(true)
    expect(insideFallbackBox(40.5, 0.5)).toBe(true)
  })

  it('rejects points outside it', () => {
    expect(insideFallbackBox(41.6, 1.2)).toBe(false)
    expect(insideFallbackBox(41.1, 2.1)).toBe(false)
  })
})

describe('mergeSectionPolygons', () => {
  it('merges every valid polygon into a multipolygon', () => {
    expect(
      mergeSectionPolygons([
        'POLYGON ((0 0, 1 0, 1 1, 0 1, 0 0))',
        'not wkt',
        'POLYGON ((2 2, 3 2, 3 3, 2 3, 2 2))',
      ])
    ).toBe('MULTIPOLYGON(((0 0,1 0,1 1,0 1,0 0)),((2 2,3 2,3 3,2 3,2 2)))')
  })

  it('returns null when nothing can be merged', () => {
    expect(mergeSectionPolygons([])).toBeNull()
    expect(mergeSectionPolygons(['not wkt'])).toBeNull()
  })
})

describe('getOrCreateBoundary', () => {
  it('returns the stored boundary', async () => {
    const { db, calls } = createMockDb([[/FROM city_boundary/, [storedBoundary(CITY)]]])
    expect(await getOrCreateBoundary(db)).toEqual(storedBoundary(CITY))
    expect(calls).toHaveLength(1)
  })

  it('computes and stores the boundary from the sections', async () => {
    const { db, callsMatching } = createMockDb([
      [/INSERT INTO city_boundary/, params => [{ id: 5, name: params[0], polygon: params[1], calculated_at: new Date() }]],
      [/ST_Union/, failingQuery],
      [/SELECT polygon FROM sections/, [{ polygon: CITY }]],
    ])

    const boundary = await getOrCreateBoundary(db)

    expect(boundary?.id).toBe(5)
    expect(callsMatching(/INSERT INTO city_boundary/)[0].params).toEqual([
      'Tarragona',
      'MULTIPOLYGON(((1 41,1.4 41,1.4 41.2,1 41.2,1 41)))',
    ])
  })

  it('returns null when there are no sections', async () => {
    const { db, callsMatching } = createMockDb([[/ST_Union/, [{ boundary: null }]]])
    expect(await getOrCreateBoundary(db)).toBeNull()
    expect(callsMatching(/INSERT/)).toHaveLength(0)
  })
})

describe('pointIsInside', () => {
  it('uses the coarse box when no boundary exists', async () => {
    const { db } = createMockDb()
    expect(await pointIsInside(db, 41.1, 1.25)).toBe(true)
    expect(await pointIsInside(db, 42, 1.25)).toBe(false)
  })

  it('takes the PostGIS answer for a stored boundary', async () => {
    const { db } = createMockDb([
      [/FROM city_boundary/, [storedBoundary(CITY)]],
      [/ST_Contains/, [{ inside: false }]],
    ])
    expect(await pointIsInside(db, 41.1, 1.25)).toBe(false)
  })

  it('checks the polygon in process when PostGIS fails', async () => {
    const { db } = createMockDb([
      [/FROM city_boundary/, [storedBoundary(CITY)]],
      [/ST_Contains/, failingQuery],
    ])
    expect(await pointIsInside(db, 41.1, 1.25)).toBe(true)
    expect(await pointIsInside(db, 41.1, 1.5)).toBe(false)
  })

  it('uses the coarse box when the boundary cannot be loaded', async () => {
    const { db } = createMockDb([[/FROM city_boundary/, failingQuery]])
    expect(await pointIsInside(db, 41.1, 1.25)).toBe(true)
  })
})

describe('boundaryWithBounds', () => {
  it('returns the geometry with map bounds', async () => {
    const { db } = createMockDb([
      [/FROM city_boundary/, [storedBoundary('POLYGON ((0 40, 10 40, 10 50, 0 50, 0 40))')]],
    ])

    const response = await boundaryWithBounds(db)

    expect(response).toEqual({
      id: 1,
      name: 'Tarragona',
      calculated_at: '2026-01-02T03:04:05.000Z',
      geometry: { type: 'Polygon', coordinates: [[[0, 40], [10, 40], [10, 50], [0, 50], [0, 40]]] },
      bounds: { southwest: [38, -2], northeast: [52, 12] },
    })
  })

  it('returns null without a boundary', async () => {
    const { db } = createMockDb()
    expect(await boundaryWithBounds(db)).toBeNull()
  })
})
