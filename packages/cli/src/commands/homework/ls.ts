import type { CliContext } from '../../session.js'
import { withDeskSession } from '../../session.js'
import type { ListResult } from '../../output/index.js'
import { homeworkSchema, sessionOptions, toRow, type HomeworkRow } from '../shared.js'

export type HomeworkLsResult = ListResult<HomeworkRow>

/**
 * Shows the same list the desk draws after every change: completed homework
 * past its due date is hidden, the rest is sorted by urgency.
 */
export async function runLsCommand(
  context: CliContext,
  _args: unknown[],
  options: Record<string, unknown>
): Promise<HomeworkLsResult> {
  return withDeskSession(context, sessionOptions(options), async (session) => ({
    type: 'list',
    data: (session.presenter.list ?? []).map(toRow),
    schema: homeworkSchema,
    warnings: session.loadWarnings,
  }))
}
