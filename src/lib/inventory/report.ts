import { z } from 'zod'
import type { Db } from '../db'
import { getConfig } from '../config'
import { ValidationError } from '../errors'
import { attachCategories, resolveCategoryIds } from '../categories'
import { pointIsInside } from '../geo/boundary'
import { haversineKm } from '../geo/polygon'
import { findSectionForPoint } from '../geo/sections'
import { sanitizeText } from '../moderation'
import { dispatchEmail } from '../jobs'
import { adminNotificationEmail } from '../email-templates'
import { createItem, setItemSection } from './repository'

// Containers overflowing are reported to the waste service, not here
export const RETIRED_SUBCATEGORIES = ['escombreries_desbordades']

export const GPS_MISMATCH_KM = 0.15

export const LOCATION_SOURCES = ['image_gps', 'browser_geolocation', 'manual', 'form_coordinates'] as const
export type LocationSource = (typeof LOCATION_SOURCES)[number]

const latitude = z.coerce.number().min(-90).max(90)
const longitude = z.coerce.number().min(-180).max(180)

export const reportInput = z.object({
  category: z.string().trim().min(1).max(50),
  subcategory: z.string().trim().max(50).nullish().transform(v => v || null),
  description: z.string().trim().max(1000).nullish(),
  address: z.string().trim().max(200).nullish(),
  latitude: latitude.nullish(),
  longitude: longitude.nullish(),
  locationSource: z.enum(['browser_geolocation', 'manual', 'form_coordinates']).nullish(),
  imagePath: z.string().trim().max(300).nullish(),
  imageGps: z.object({ latitude, longitude }).nullish(),
})

export type ReportInput = z.input<typeof reportInput>

export type ResolvedLocation = {
  latitude: number
  longitude: number
  source: LocationSource
  warnings: string[]
}

/**
 * Photo GPS wins over submitted coordinates. A large gap between the two
 * is reported back as a warning.
 */
export function resolveLocation(input: z.infer<typeof reportInput>): ResolvedLocation {
  const warnings: string[] = []

  if (input.imageGps) {
    if (input.latitude != null && input.longitude != null) {
      const km = haversineKm(input.imageGps.latitude, input.imageGps.longitude, input.latitude, input.longitude)
      if (km > GPS_MISMATCH_KM) {
        warnings.push(
          `The photo was taken ${Math.round(km * 1000)} m away from the selected location; the photo location was used`
        )
      }
    }
    return { latitude: input.imageGps.latitude, longitude: input.imageGps.longitude, source: 'image_gps', warnings }
  }

  if (input.latitude == null || input.longitude == null) {
    throw new ValidationError('Location is required', { location: ['Select a point on the map'] })
  }

  return {
    latitude: input.latitude,
    longitude: input.longitude,
    source: input.locationSource ?? 'form_coordinates',
    warnings,
  }
}

export type ReportResult = {
  id: number
  status: 'pending'
  sectionId: number | null
  locationSource: LocationSource
  warnings: string[]
}

export async function reportItem(db: Db, raw: unknown, reporterId: number): Promise<ReportResult> {
  const input = reportInput.parse(raw)

  if (input.subcategory && RETIRED_SUBCATEGORIES.includes(input.subcategory)) {
    throw new ValidationError('This subcategory can no longer be reported', {
      subcategory: ['Overflowing containers are no longer accepted'],
    })
  }

  const location = resolveLocation(input)

  if (!(await pointIsInside(db, location.latitude, location.longitude))) {
    throw new ValidationError('The location is outside the city', {
      location: ['Select a point inside the city boundary'],
    })
  }

  const { mainId, subId } = await resolveCategoryIds(db, input.category, input.subcategory)
  if (mainId === null) {
    throw new ValidationError('Unknown category', { category: [`'${input.category}' is not a category`] })
  }
  if (input.subcategory && subId === null) {
    throw new ValidationError('Unknown subcategory', {
      subcategory: [`'${input.subcategory}' is not a subcategory of '${input.category}'`],
    })
  }

  const description = input.description ? sanitizeText(input.description) : null
  const address = input.address ? sanitizeText(input.address) : null

  const id = await db.transaction(async tx => {
    const itemId = await createItem(tx, {
      categoryCode: input.category,
      subcategoryCode: input.subcategory,
      description,
      latitude: location.latitude,
      longitude: location.longitude,
      address,
      imagePath: input.imagePath ?? null,
      imageGpsLatitude: input.imageGps?.latitude ?? null,
      imageGpsLongitude: input.imageGps?.longitude ?? null,
      locationSource: location.source,
      reporterId,
    })
    await attachCategories(tx, itemId, mainId, subId)
    return itemId
  })

  // Outside the transaction: a failed PostGIS call would abort it
  let sectionId: number | null = null
  try {
    const section = await findSectionForPoint(db, location.latitude, location.longitude)
    if (section) {
      await setItemSection(db, id, section.id)
      sectionId = section.id
    } else {
      console.warn(`[inventory] No section found for item ${id} at (${location.latitude}, ${location.longitude})`)
    }
  } catch (error) {
    console.warn(`[inventory] Section assignment failed for item ${id}:`, error)
  }

  const config = getConfig()
  const notification = adminNotificationEmail({
    title: 'New inventory report',
    fields: {
      Item: id,
      Category: input.subcategory ? `${input.category} / ${input.subcategory}` : input.category,
      Location: `${location.latitude.toFixed(6)}, ${location.longitude.toFixed(6)} (${location.source})`,
      Address: input.address,
      Description: input.description,
    },
    link: `${config.appUrl}/admin/inventory?status=pending`,
  })
  await dispatchEmail(db, { to: config.adminEmail, ...notification })

  console.log(`[inventory] Item ${id} reported by user ${reporterId} (section ${sectionId ?? 'none'})`)
  return { id, status: 'pending', sectionId, locationSource: location.source, warnings: location.warnings }
}
