import { z } from 'zod'
import type { DailyVolume, DerivedViews } from '@duedesk/core'
import type { CliContext } from '../session.js'
import { withDeskSession } from '../session.js'
import type { ListResult, OutputSchema } from '../output/index.js'
import { parseInput, sessionOptions } from './shared.js'

export interface StatRow {
  metric: string
  value: number
}

export interface DailyRow extends DailyVolume {
  chart: string
}

const statSchema: OutputSchema<StatRow> = {
  columns: [
    { header: 'METRIC', value: (row) => row.metric },
    { header: 'VALUE', value: (row) => row.value },
  ],
}

const dailySchema: OutputSchema<DailyRow> = {
  columns: [
    { header: 'DATE', value: (row) => row.date },
    { header: 'CREATED', value: (row) => row.created },
    { header: 'DUE', value: (row) => row.due },
    { header: 'CHART', value: (row) => row.chart, color: () => 'cyan' },
  ],
}

const StatsOptionsSchema = z.object({ daily: z.boolean().optional() }).passthrough()

export function toStatRows(views: DerivedViews): StatRow[] {
  return [
    { metric: 'total', value: views.summary.total },
    { metric: 'completed', value: views.summary.completed },
    { metric: 'overdue', value: views.summary.overdue },
    { metric: 'due today', value: views.summary.dueToday },
    { metric: 'due soon', value: views.counts.due_soon },
    { metric: 'pending', value: views.counts.pending },
  ]
}

export function toDailyRows(views: DerivedViews): DailyRow[] {
  return views.daily.map((day) => ({
    ...day,
    chart: '+'.repeat(day.created) + '!'.repeat(day.due),
  }))
}

export async function runStatsCommand(
  context: CliContext,
  _args: unknown[],
  options: Record<string, unknown>
): Promise<ListResult<StatRow> | ListResult<DailyRow>> {
  const { daily } = parseInput(StatsOptionsSchema, options)

  return withDeskSession(context, sessionOptions(options), async (session) => {
    const views = session.presenter.aggregates
    if (daily) {
      return {
        type: 'list',
        data: views ? toDailyRows(views) : [],
        schema: dailySchema,
        warnings: session.loadWarnings,
      }
    }
    return {
      type: 'list',
      data: views ? toStatRows(views) : [],
      schema: statSchema,
      warnings: session.loadWarnings,
    }
  })
}
