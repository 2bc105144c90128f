/**
 * Command wrapper for automatic output rendering.
 *
 * Wraps command handlers to render their results and turn thrown errors into
 * a rendered message plus a non-zero exit code.
 */

import { Command } from 'commander'
import { z } from 'zod'
import type { AnyCommandResult, OutputOptions } from './types.js'
import {
  defaultOutputOptions,
  render,
  renderError,
  renderWarnings,
  toCommandError,
} from './render.js'

/** Where rendered output goes. The real CLI writes to process streams. */
export interface OutputSink {
  stdout(text: string): void
  stderr(text: string): void
  setExitCode(code: number): void
}

export const processOutputSink: OutputSink = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code
  },
}

const GlobalOutputOptionsSchema = z
  .object({
    json: z.boolean().optional(),
    headers: z.boolean().optional(),
    color: z.boolean().optional(),
  })
  .passthrough()

/** Commander uses --no-headers -> headers: false, --no-color -> color: false */
export function extractOutputOptions(raw: unknown): OutputOptions {
  const parsed = GlobalOutputOptionsSchema.safeParse(raw)
  if (!parsed.success) {
    return defaultOutputOptions
  }
  return {
    format: parsed.data.json ? 'json' : defaultOutputOptions.format,
    noHeaders: parsed.data.headers === false,
    noColor: parsed.data.color === false,
  }
}

/**
 * Wrap a command handler to render its output.
 *
 * The handler receives commander's positional arguments followed by the
 * merged local and global options.
 *
 * @example
 * ```typescript
 * program
 *   .command('ls')
 *   .action(withOutput(sink, async (options) => {
 *     return { type: 'list', data, schema }
 *   }))
 * ```
 */
export function withOutput(
  sink: OutputSink,
  handler: (args: unknown[], options: Record<string, unknown>) => Promise<AnyCommandResult>
): (...args: unknown[]) => Promise<void> {
  return async (...args) => {
    // Commander passes positionals, then local options, then the command itself
    const command = args[args.length - 1]
    const options: Record<string, unknown> =
      command instanceof Command ? command.optsWithGlobals() : {}
    const positionals = command instanceof Command ? args.slice(0, -2) : args
    const outputOptions = extractOutputOptions(options)

    try {
      const result = await handler(positionals, options)
      if (result.warnings?.length) {
        sink.stderr(renderWarnings(result.warnings, outputOptions) + '\n')
      }
      const output = render(result, outputOptions)
      if (output) {
        sink.stdout(output + '\n')
      }
    } catch (error) {
      const commandError = toCommandError(error)
      sink.stderr(renderError(commandError, outputOptions) + '\n')
      sink.setExitCode(1)
    }
  }
}

/**
 * Helper to create output options from partial input.
 * Useful for testing or manual rendering.
 */
export function createOutputOptions(partial: Partial<OutputOptions> = {}): OutputOptions {
  return { ...defaultOutputOptions, ...partial }
}
