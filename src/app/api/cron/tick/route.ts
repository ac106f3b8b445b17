import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { getConfig } from '@/lib/config'
import { processEmailJobs } from '@/lib/jobs'
import { sendInitiativeReminders } from '@/lib/initiatives'

// GET /api/cron/tick - Protected endpoint for external cron services
export async function GET(req: NextRequest) {
  const cronSecret = getConfig().cronSecret
  if (!cronSecret) {
    console.error('[cron] CRON_SECRET not configured')
    return NextResponse.json({ error: 'Server misconfigured' }, { status: 500 })
  }
  const authHeader = req.headers.get('authorization')
  if (authHeader !== `Bearer ${cronSecret}`) {
    return NextResponse.json({ error: 'Unauthorized' }, { status: 401 })
  }
  try {
    // Reminders first so they go out in this same tick
    const reminders = await sendInitiativeReminders(db)
    const emails = await processEmailJobs(db)

    return NextResponse.json({
      success: true,
      emails,
      reminders,
      timestamp: new Date().toISOString(),
    })
  } catch (error) {
    console.error('[cron] Error processing tick:', error)
    const errorMessage = error instanceof Error ? error.message : 'Unknown error'
    return NextResponse.json({ error: 'Failed to process tick', message: errorMessage }, { status: 500 })
  }
}

// Prevent caching
export const dynamic = 'force-dynamic'
export const revalidate = 0
