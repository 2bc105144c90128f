import { mkdtempSync, rmSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { runCli } from './helpers/run-cli.js'

describe('duedesk settings / stats', () => {
  let home: string

  beforeEach(async () => {
    home = mkdtempSync(path.join(os.tmpdir(), 'duedesk-cli-'))
    await runCli(home, ['add', 'A', 'Math', 'Ex 1', '--due', '12/03/2025'])
    await runCli(home, ['add', 'B', 'Math', 'Ex 2', '--due', '10/03/2025', '--created', '09/03/2025'])
    await runCli(home, ['add', 'C', 'Art', 'Poster', '--due', '01/03/2025', '--created', '01/03/2025'])
    await runCli(home, ['done', 'C'])
  })

  afterEach(() => {
    rmSync(home, { recursive: true, force: true })
  })

  it('shows the current settings', async () => {
    const result = await runCli(home, ['--json', 'settings'])
    expect(JSON.parse(result.stdout)).toEqual({ remindDays: 3, chartDays: 5 })
  })

  it('updates the reminder window and retags homework', async () => {
    const update = await runCli(home, ['--json', 'settings', '--remind-days', '1'])
    expect(JSON.parse(update.stdout)).toEqual({ message: 'Settings updated' })

    const settings = await runCli(home, ['--json', 'settings'])
    expect(JSON.parse(settings.stdout)).toEqual({ remindDays: 1, chartDays: 5 })

    const list = await runCli(home, ['--json', 'ls'])
    const rows: { code: string; status: string }[] = JSON.parse(list.stdout)
    expect(rows.map((row) => [row.code, row.status])).toEqual([
      ['B', 'due_today'],
      ['A', 'pending'],
    ])
  })

  it('rejects a non-numeric setting', async () => {
    const result = await runCli(home, ['--json', 'settings', '--chart-days', 'many'])
    expect(result.exitCode).toBe(1)
    expect(JSON.parse(result.stderr)).toEqual({
      error: { code: 'INVALID_ARGUMENTS', message: '--chart-days must be a whole number' },
    })
  })

  it('summarizes visible homework', async () => {
    const result = await runCli(home, ['--json', 'stats'])
    expect(JSON.parse(result.stdout)).toEqual([
      { metric: 'total', value: 2 },
      { metric: 'completed', value: 0 },
      { metric: 'overdue', value: 0 },
      { metric: 'due today', value: 1 },
      { metric: 'due soon', value: 1 },
      { metric: 'pending', value: 0 },
    ])
  })

  it('charts the last days of activity', async () => {
    const result = await runCli(home, ['--json', 'stats', '--daily'])
    expect(JSON.parse(result.stdout)).toEqual([
      { date: '06/03/2025', created: 0, due: 0, chart: '' },
      { date: '07/03/2025', created: 0, due: 0, chart: '' },
      { date: '08/03/2025', created: 0, due: 0, chart: '' },
      { date: '09/03/2025', created: 1, due: 0, chart: '+' },
      { date: '10/03/2025', created: 1, due: 1, chart: '+!' },
    ])
  })
})
