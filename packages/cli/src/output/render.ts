import { Chalk, type ChalkInstance } from 'chalk'
import type {
  AnyCommandResult,
  ColumnDef,
  CommandError,
  OutputOptions,
  OutputSchema,
} from './types.js'

export const defaultOutputOptions: OutputOptions = {
  format: 'table',
  noHeaders: false,
  noColor: false,
}

function painter(options: OutputOptions): ChalkInstance {
  return options.noColor ? new Chalk({ level: 0 }) : new Chalk()
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '-'
  return String(value)
}

function fit(text: string, width: number): string {
  if (text.length > width) {
    return width > 1 ? text.slice(0, width - 1) + '…' : text.slice(0, width)
  }
  return text.padEnd(width)
}

function paint<T>(chalk: ChalkInstance, column: ColumnDef<T>, raw: unknown, text: string): string {
  const color = column.color?.(raw)
  return color ? chalk[color](text) : text
}

function renderTable<T>(rows: T[], schema: OutputSchema<T>, options: OutputOptions): string {
  const chalk = painter(options)
  const widths = schema.columns.map(
    (column) =>
      column.width ??
      Math.max(column.header.length, ...rows.map((row) => cellText(column.value(row)).length))
  )

  const lines: string[] = []
  if (!options.noHeaders) {
    lines.push(
      chalk.bold(schema.columns.map((column, i) => fit(column.header, widths[i])).join('  ')).trimEnd()
    )
  }
  for (const row of rows) {
    const cells = schema.columns.map((column, i) => {
      const raw = column.value(row)
      return paint(chalk, column, raw, fit(cellText(raw), widths[i]))
    })
    lines.push(cells.join('  ').trimEnd())
  }
  return lines.join('\n')
}

function renderSingle<T>(data: T, schema: OutputSchema<T>, options: OutputOptions): string {
  const chalk = painter(options)
  const labelWidth = Math.max(...schema.columns.map((column) => column.header.length))
  return schema.columns
    .map((column) => {
      const raw = column.value(data)
      const label = chalk.bold(column.header.padEnd(labelWidth))
      return `${label}  ${paint(chalk, column, raw, cellText(raw))}`
    })
    .join('\n')
}

export function render<T>(result: AnyCommandResult<T>, options: OutputOptions): string {
  if (options.format === 'json') {
    if (result.type === 'message') {
      return JSON.stringify({ message: result.message }, null, 2)
    }
    return JSON.stringify(result.data, null, 2)
  }

  switch (result.type) {
    case 'list':
      if (result.data.length === 0) {
        return painter(options).gray('No homework to show')
      }
      return renderTable(result.data, result.schema, options)
    case 'single':
      return renderSingle(result.data, result.schema, options)
    case 'message':
      return result.message
  }
}

export function renderWarnings(warnings: string[], options: OutputOptions): string {
  if (options.format === 'json') {
    return warnings.map((warning) => JSON.stringify({ warning })).join('\n')
  }
  const chalk = painter(options)
  return warnings.map((warning) => chalk.yellow(`warning: ${warning}`)).join('\n')
}

export function renderError(error: CommandError, options: OutputOptions): string {
  if (options.format === 'json') {
    return JSON.stringify({ error }, null, 2)
  }
  const chalk = painter(options)
  const lines = [chalk.red(`Error: ${error.message}`)]
  if (error.details) {
    lines.push(chalk.gray(error.details))
  }
  return lines.join('\n')
}

function isCommandError(error: unknown): error is CommandError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    'message' in error &&
    typeof error.code === 'string' &&
    typeof error.message === 'string'
  )
}

export function toCommandError(error: unknown): CommandError {
  if (isCommandError(error)) {
    return error
  }
  return {
    code: 'UNEXPECTED_ERROR',
    message: error instanceof Error ? error.message : String(error),
  }
}
