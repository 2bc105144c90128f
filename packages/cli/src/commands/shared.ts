import { z } from 'zod'
import type { ListedHomework, StatusTag } from '@duedesk/core'
import type { CommandError, OutputSchema } from '../output/index.js'
import type { TaskReport } from '../session.js'

/** Homework list item for display */
export interface HomeworkRow {
  code: string
  subject: string
  content: string
  created: string
  due: string
  status: StatusTag
}

function statusColor(value: unknown) {
  if (value === 'overdue') return 'red' as const
  if (value === 'due_today') return 'magenta' as const
  if (value === 'due_soon') return 'yellow' as const
  if (value === 'completed') return 'green' as const
  return undefined
}

export const homeworkSchema: OutputSchema<HomeworkRow> = {
  columns: [
    { header: 'CODE', value: (row) => row.code },
    { header: 'SUBJECT', value: (row) => row.subject },
    { header: 'CONTENT', value: (row) => row.content, width: 32 },
    { header: 'CREATED', value: (row) => row.created },
    { header: 'DUE', value: (row) => row.due },
    { header: 'STATUS', value: (row) => row.status, color: statusColor },
  ],
}

export function toRow(item: ListedHomework): HomeworkRow {
  return {
    code: item.code,
    subject: item.subject,
    content: item.content,
    created: item.createDate,
    due: item.dueDate,
    status: item.tag,
  }
}

const SessionOptionsSchema = z.object({ document: z.string().optional() }).passthrough()

export function sessionOptions(options: Record<string, unknown>): { document?: string } {
  const parsed = SessionOptionsSchema.safeParse(options)
  return parsed.success && parsed.data.document ? { document: parsed.data.document } : {}
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const error: CommandError = {
      code: 'INVALID_ARGUMENTS',
      message: issue ? issue.message : 'Invalid arguments',
    }
    throw error
  }
  return parsed.data
}

/** The info notices a task produced, or `fallback` when it had none. */
export function summarizeReport(report: TaskReport, fallback: string): string {
  const lines = report.notices
    .filter((notice) => notice.severity === 'info')
    .map((notice) => notice.message)
  return lines.length > 0 ? lines.join('\n') : fallback
}
