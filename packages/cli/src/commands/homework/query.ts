import { z } from 'zod'
import type { CliContext } from '../../session.js'
import { withDeskSession } from '../../session.js'
import type { ListResult } from '../../output/index.js'
import { homeworkSchema, parseInput, sessionOptions, toRow, type HomeworkRow } from '../shared.js'

const QueryArgsSchema = z.tuple([z.string().min(1, 'A date is required')])
const QueryOptionsSchema = z
  .object({
    by: z.enum(['due', 'create'], {
      errorMap: () => ({ message: '--by must be "due" or "create"' }),
    }),
  })
  .passthrough()

export async function runQueryCommand(
  context: CliContext,
  args: unknown[],
  options: Record<string, unknown>
): Promise<ListResult<HomeworkRow>> {
  const [date] = parseInput(QueryArgsSchema, args)
  const { by } = parseInput(QueryOptionsSchema, options)

  return withDeskSession(context, sessionOptions(options), async (session) => {
    await session.run('query', { date, field: by })
    return {
      type: 'list',
      data: (session.presenter.list ?? []).map(toRow),
      schema: homeworkSchema,
      warnings: session.loadWarnings,
    }
  })
}
