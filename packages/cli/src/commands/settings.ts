import { z } from 'zod'
import type { CliContext } from '../session.js'
import { withDeskSession } from '../session.js'
import type { MessageResult, OutputSchema, SingleResult } from '../output/index.js'
import { parseInput, sessionOptions, summarizeReport } from './shared.js'

export interface SettingsView {
  remindDays: number
  chartDays: number
}

const settingsSchema: OutputSchema<SettingsView> = {
  columns: [
    { header: 'REMIND DAYS', value: (row) => row.remindDays },
    { header: 'CHART DAYS', value: (row) => row.chartDays },
  ],
}

function wholeNumber(flag: string) {
  return z
    .string()
    .regex(/^\d+$/, `${flag} must be a whole number`)
    .transform((value) => Number.parseInt(value, 10))
    .optional()
}

const SettingsOptionsSchema = z
  .object({
    remindDays: wholeNumber('--remind-days'),
    chartDays: wholeNumber('--chart-days'),
  })
  .passthrough()

/** Without flags, prints the current settings; otherwise updates them. */
export async function runSettingsCommand(
  context: CliContext,
  _args: unknown[],
  options: Record<string, unknown>
): Promise<SingleResult<SettingsView> | MessageResult> {
  const { remindDays, chartDays } = parseInput(SettingsOptionsSchema, options)

  return withDeskSession(context, sessionOptions(options), async (session) => {
    if (remindDays === undefined && chartDays === undefined) {
      const settings = session.desk.state.settingsSnapshot()
      return {
        type: 'single',
        data: { remindDays: settings.remindDays, chartDays: settings.chartDays },
        schema: settingsSchema,
        warnings: session.loadWarnings,
      }
    }

    const patch: { remindDays?: number; chartDays?: number } = {}
    if (remindDays !== undefined) patch.remindDays = remindDays
    if (chartDays !== undefined) patch.chartDays = chartDays
    const report = await session.run('updateSettings', patch)
    return {
      type: 'message',
      message: summarizeReport(report, 'Settings updated'),
      warnings: session.loadWarnings,
    }
  })
}
