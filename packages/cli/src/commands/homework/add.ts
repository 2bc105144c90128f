import { z } from 'zod'
import { calendarDateOf, formatCalendarDate } from '@duedesk/core'
import type { CliContext } from '../../session.js'
import { withDeskSession } from '../../session.js'
import type { MessageResult } from '../../output/index.js'
import { parseInput, sessionOptions, summarizeReport } from '../shared.js'

const AddArgsSchema = z.tuple([z.string(), z.string(), z.string()])
const AddOptionsSchema = z
  .object({
    due: z.string({ required_error: '--due is required' }),
    created: z.string().optional(),
  })
  .passthrough()

export async function runAddCommand(
  context: CliContext,
  args: unknown[],
  options: Record<string, unknown>
): Promise<MessageResult> {
  const [code, subject, content] = parseInput(AddArgsSchema, args)
  const { due, created } = parseInput(AddOptionsSchema, options)
  // Creation date defaults to today
  const createDate = created ?? formatCalendarDate(calendarDateOf(context.clock()))

  return withDeskSession(context, sessionOptions(options), async (session) => {
    const report = await session.run('add', { code, subject, content, createDate, dueDate: due })
    return {
      type: 'message',
      message: summarizeReport(report, 'Homework added'),
      warnings: session.loadWarnings,
    }
  })
}
