import { z } from 'zod'
import type { CliContext } from '../../session.js'
import { withDeskSession } from '../../session.js'
import type { MessageResult } from '../../output/index.js'
import { parseInput, sessionOptions, summarizeReport } from '../shared.js'

const RmArgsSchema = z.tuple([z.array(z.string())])

export async function runRmCommand(
  context: CliContext,
  args: unknown[],
  options: Record<string, unknown>
): Promise<MessageResult> {
  const [codes] = parseInput(RmArgsSchema, args)

  return withDeskSession(context, sessionOptions(options), async (session) => {
    const report = await session.run('delete', { codes })
    return {
      type: 'message',
      message: summarizeReport(report, 'Homework deleted'),
      warnings: session.loadWarnings,
    }
  })
}
