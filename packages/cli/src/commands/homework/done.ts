import { z } from 'zod'
import type { CliContext } from '../../session.js'
import { withDeskSession } from '../../session.js'
import type { MessageResult } from '../../output/index.js'
import { parseInput, sessionOptions, summarizeReport } from '../shared.js'

const DoneArgsSchema = z.tuple([z.string().trim().min(1, 'A homework code is required')])

export async function runDoneCommand(
  context: CliContext,
  args: unknown[],
  options: Record<string, unknown>
): Promise<MessageResult> {
  const [code] = parseInput(DoneArgsSchema, args)

  return withDeskSession(context, sessionOptions(options), async (session) => {
    const report = await session.run('markCompleted', { code })
    return {
      type: 'message',
      message: summarizeReport(report, `Homework '${code}' marked as completed`),
      warnings: session.loadWarnings,
    }
  })
}
