/**
 * Management commands.
 *
 * Usage:
 *   npx tsx scripts/manage.ts init-db
 *   npx tsx scripts/manage.ts db upgrade
 *   npx tsx scripts/manage.ts import-zones --geojson-dir geojson
 */

import 'dotenv/config'
import { Command } from 'commander'
import { db, closePool } from '../src/lib/db'
import { getConfig } from '../src/lib/config'
import { appliedMigrations, loadMigrations, pendingMigrations, runMigrations } from '../src/lib/migrate'
import { migrateItemsToCategories, seedCategories } from '../src/lib/categories'
import { importZones } from '../src/lib/geo/zones'
import { createSampleData, initDb } from '../src/lib/setup'
import { findUserByEmail } from '../src/lib/users'
import { processEmailJobs } from '../src/lib/jobs'

const program = new Command()

program
  .name('manage')
  .description('Database and data management commands')
  .version('0.1.0')

// Runs an action, closes the pool and sets the exit code
function run<A extends unknown[]>(action: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await action(...args)
    } catch (error) {
      console.error('[cli] Command failed:', error)
      process.exitCode = 1
    } finally {
      await closePool()
    }
  }
}

program
  .command('init-db')
  .description('Run migrations, create roles and the admin user')
  .action(run(async () => {
    const config = getConfig()
    const result = await initDb(db, { email: config.adminEmail, password: process.env.ADMIN_PASSWORD })

    console.log(`[cli] Migrations applied: ${result.applied.length ? result.applied.join(', ') : 'none'}`)
    console.log(`[cli] Roles created: ${result.rolesCreated}`)
    if (result.admin?.created) console.log(`[cli] Admin user created: ${config.adminEmail}`)
    if (result.admin?.passwordReset) console.log(`[cli] Admin password updated for ${config.adminEmail}`)
  }))

const dbCommand = program.command('db').description('Schema migrations')

dbCommand
  .command('upgrade')
  .description('Apply pending migrations')
  .action(run(async () => {
    const applied = await runMigrations(db)
    console.log(applied.length ? `[cli] Applied ${applied.length} migration(s)` : '[cli] Database is up to date')
  }))

dbCommand
  .command('status')
  .description('List applied and pending migrations')
  .action(run(async () => {
    const all = loadMigrations()
    const applied = await appliedMigrations(db)
    const pending = pendingMigrations(all, applied)

    for (const name of applied) console.log(`  [x] ${name}`)
    for (const migration of pending) console.log(`  [ ] ${migration.name}`)
    console.log(`[cli] ${applied.length} applied, ${pending.length} pending`)
  }))

program
  .command('seed-categories')
  .description('Create or update the inventory category tree')
  .action(run(async () => {
    const admin = await findUserByEmail(db, getConfig().adminEmail)
    const result = await seedCategories(db, admin?.id ?? null)
    console.log(`[cli] Categories: ${result.created} created, ${result.updated} updated`)
  }))

program
  .command('migrate-categories')
  .description('Move legacy item categories onto the category tree')
  .option('--dry-run', 'Report what would change without writing')
  .action(run(async (options: { dryRun?: boolean }) => {
    const result = await migrateItemsToCategories(db, { dryRun: Boolean(options.dryRun) })
    for (const error of result.errors) console.warn(`[cli] ${error}`)
    if (result.errors.length) process.exitCode = 1
  }))

program
  .command('import-zones')
  .description('Import districts and sections from GeoJSON files')
  .requiredOption('--geojson-dir <dir>', 'Directory with sections.geojson and districts.geojson')
  .action(run(async (options: { geojsonDir: string }) => {
    const result = await importZones(db, options.geojsonDir)
    console.log(`[cli] Imported ${result.districts} districts and ${result.sections} sections`)
  }))

program
  .command('create-sample-data')
  .description('Create sample initiatives owned by the admin user')
  .action(run(async () => {
    const { adminEmail } = getConfig()
    const admin = await findUserByEmail(db, adminEmail)
    if (!admin) {
      throw new Error(`Admin user ${adminEmail} not found. Run init-db first.`)
    }
    const result = await createSampleData(db, admin.id)
    console.log(`[cli] Created ${result.created} of ${result.total} sample initiatives`)
  }))

program
  .command('process-jobs')
  .description('Send due queued emails once')
  .option('--limit <n>', 'Maximum jobs to process', '50')
  .action(run(async (options: { limit: string }) => {
    const result = await processEmailJobs(db, parseInt(options.limit) || 50)
    console.log(`[cli] ${result.sent} sent, ${result.retried} retried, ${result.failed} failed`)
  }))

program.parseAsync(process.argv).catch(error => {
  console.error('[cli] Command failed:', error)
  process.exitCode = 1
})
