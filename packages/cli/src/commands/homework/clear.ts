import { z } from 'zod'
import type { CliContext } from '../../session.js'
import { withDeskSession } from '../../session.js'
import type { CommandError, MessageResult } from '../../output/index.js'
import { parseInput, sessionOptions, summarizeReport } from '../shared.js'

const ClearOptionsSchema = z.object({ yes: z.boolean().optional() }).passthrough()

/** Removes every homework item. Needs --yes, since there is no undo. */
export async function runClearCommand(
  context: CliContext,
  _args: unknown[],
  options: Record<string, unknown>
): Promise<MessageResult> {
  const { yes } = parseInput(ClearOptionsSchema, options)
  if (!yes) {
    const error: CommandError = {
      code: 'CONFIRMATION_REQUIRED',
      message: 'Refusing to clear all homework without --yes',
      details: 'Run: duedesk clear --yes',
    }
    throw error
  }

  return withDeskSession(context, sessionOptions(options), async (session) => {
    const report = await session.run('clearAll', {})
    return {
      type: 'message',
      message: summarizeReport(report, 'All homework cleared'),
      warnings: session.loadWarnings,
    }
  })
}
