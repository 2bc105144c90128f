/**
 * Output types shared by every command.
 *
 * Commands return structured results; rendering to a table or JSON happens
 * in one place.
 */

export type OutputFormat = 'table' | 'json'

export type ColorName = 'red' | 'green' | 'yellow' | 'magenta' | 'cyan' | 'gray'

export interface OutputOptions {
  format: OutputFormat
  noHeaders: boolean
  noColor: boolean
}

export interface ColumnDef<T> {
  header: string
  width?: number
  value(row: T): unknown
  color?(value: unknown): ColorName | undefined
}

export interface OutputSchema<T> {
  columns: ColumnDef<T>[]
}

interface ResultBase {
  /** Non-fatal problems, written to stderr ahead of the result. */
  warnings?: string[]
}

export interface ListResult<T> extends ResultBase {
  type: 'list'
  data: T[]
  schema: OutputSchema<T>
}

export interface SingleResult<T> extends ResultBase {
  type: 'single'
  data: T
  schema: OutputSchema<T>
}

export interface MessageResult extends ResultBase {
  type: 'message'
  message: string
}

export type AnyCommandResult<T = unknown> = ListResult<T> | SingleResult<T> | MessageResult

export interface CommandError {
  code: string
  message: string
  details?: string
}
