import type { Db } from './db'

/**
 * URL-friendly slug. Keeps accented letters, drops emoji and punctuation.
 */
export function generateSlug(title: string | null | undefined): string {
  if (!title) return 'untitled'

  const slug = title
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '')

  return slug || 'untitled'
}

/**
 * Slug not yet used by any initiative: base, base-1, base-2, ...
 */
export async function uniqueSlug(db: Db, title: string, excludeId?: number): Promise<string> {
  const base = generateSlug(title)
  let slug = base
  let counter = 1

  for (;;) {
    const rows = await db.query<{ id: number }>(
      'SELECT id FROM initiatives WHERE slug = $1 AND ($2::int IS NULL OR id <> $2) LIMIT 1',
      [slug, excludeId ?? null]
    )
    if (rows.length === 0) return slug
    slug = `${base}-${counter}`
    counter++
  }
}
