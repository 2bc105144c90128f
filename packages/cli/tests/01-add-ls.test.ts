import { mkdtempSync, readFileSync, rmSync, existsSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { runCli } from './helpers/run-cli.js'

describe('duedesk add / ls', () => {
  let home: string

  beforeEach(() => {
    home = mkdtempSync(path.join(os.tmpdir(), 'duedesk-cli-'))
  })

  afterEach(() => {
    rmSync(home, { recursive: true, force: true })
  })

  it('creates the document on first add and warns that none existed', async () => {
    const result = await runCli(home, [
      '--json',
      'add',
      'M1',
      'Math',
      'Ex 1-5',
      '--due',
      '12/3/2025',
      '--created',
      '01/03/2025',
    ])

    expect(result.exitCode).toBe(0)
    expect(JSON.parse(result.stdout)).toEqual({ message: "Homework 'M1' added" })
    const documentPath = path.join(home, 'homework_data.json')
    expect(JSON.parse(result.stderr)).toEqual({
      warning: `Failed to load homework: Document not found: ${documentPath}`,
    })
    expect(JSON.parse(readFileSync(documentPath, 'utf8'))).toEqual({
      homeworks: [
        {
          code: 'M1',
          subject: 'Math',
          content: 'Ex 1-5',
          create_date: '01/03/2025',
          due_date: '12/03/2025',
          status: 'pending',
        },
      ],
      settings: { remind_days: 3, chart_days: 5 },
    })
    expect(existsSync(path.join(home, 'config.json'))).toBe(true)
  })

  it('defaults the creation date to today', async () => {
    await runCli(home, ['add', 'E1', 'English', 'Essay', '--due', '20/03/2025'])
    const result = await runCli(home, ['--json', 'ls'])

    expect(JSON.parse(result.stdout)).toEqual([
      {
        code: 'E1',
        subject: 'English',
        content: 'Essay',
        created: '10/03/2025',
        due: '20/03/2025',
        status: 'pending',
      },
    ])
    expect(result.stderr).toBe('')
  })

  it('lists homework by urgency', async () => {
    await runCli(home, ['add', 'LATER', 'Art', 'Sketch', '--due', '30/03/2025'])
    await runCli(home, ['add', 'SOON', 'Math', 'Ex 2', '--due', '12/03/2025'])
    await runCli(home, ['add', 'TODAY', 'Physics', 'Lab', '--due', '10/03/2025'])
    await runCli(home, ['add', 'LATE', 'History', 'Notes', '--due', '01/03/2025', '--created', '20/02/2025'])

    const result = await runCli(home, ['--json', 'ls'])
    const rows: { code: string; status: string }[] = JSON.parse(result.stdout)

    expect(rows.map((row) => [row.code, row.status])).toEqual([
      ['TODAY', 'due_today'],
      ['LATE', 'overdue'],
      ['SOON', 'due_soon'],
      ['LATER', 'pending'],
    ])
  })

  it('renders a table', async () => {
    await runCli(home, ['add', 'M1', 'Math', 'Ex 1-5', '--due', '12/03/2025', '--created', '01/03/2025'])
    const result = await runCli(home, ['--no-color', 'ls'])

    const header = ['CODE', 'SUBJECT', 'CONTENT'.padEnd(32), 'CREATED   ', 'DUE       ', 'STATUS']
    const row = ['M1  ', 'Math   ', 'Ex 1-5'.padEnd(32), '01/03/2025', '12/03/2025', 'due_soon']
    expect(result.stdout).toBe(`${header.join('  ')}\n${row.join('  ')}\n`)
  })

  it('rejects a duplicate code with a non-zero exit', async () => {
    await runCli(home, ['add', 'M1', 'Math', 'Ex 1-5', '--due', '12/03/2025'])
    const result = await runCli(home, ['--json', 'add', 'M1', 'Math', 'Again', '--due', '13/03/2025'])

    expect(result.exitCode).toBe(1)
    expect(result.stdout).toBe('')
    expect(JSON.parse(result.stderr)).toEqual({
      error: { code: 'TASK_FAILED', message: "Homework code 'M1' already exists" },
    })
  })

  it('reads the document named by --document', async () => {
    await runCli(home, ['--document', 'term2.json', 'add', 'T1', 'Chemistry', 'Titration', '--due', '15/03/2025'])

    expect(existsSync(path.join(home, 'term2.json'))).toBe(true)
    expect(existsSync(path.join(home, 'homework_data.json'))).toBe(false)
  })
})
