import path from 'node:path'
import type { Logger } from 'pino'
import {
  HomeworkDesk,
  createRootLogger,
  loadPersistedConfig,
  resolveDeskConfig,
  resolveDeskHome,
  type DerivedViews,
  type DeskPresenter,
  type ListedHomework,
  type NoticeSeverity,
  type TaskKind,
  type TaskParamsMap,
} from '@duedesk/core'
import type { CommandError } from './output/index.js'

export type Env = Record<string, string | undefined>

/** What a command needs from its surroundings; tests swap every piece. */
export interface CliContext {
  env: Env
  cwd: string
  clock: () => Date
  logger?: Logger
}

export interface Notice {
  message: string
  severity: NoticeSeverity
}

/** Keeps whatever the desk last presented so a command can render it. */
export class CapturingPresenter implements DeskPresenter {
  notices: Notice[] = []
  list: ListedHomework[] | null = null
  aggregates: DerivedViews | null = null

  notifyUser(message: string, severity: NoticeSeverity): void {
    this.notices.push({ message, severity })
  }

  presentList(items: readonly ListedHomework[], progressFraction?: number): void {
    // Partial lists during a load are superseded by the final refresh
    if (progressFraction === undefined) {
      this.list = [...items]
    }
  }

  presentAggregates(views: DerivedViews): void {
    this.aggregates = views
  }

  takeNotices(): Notice[] {
    return this.notices.splice(0)
  }
}

export interface TaskReport {
  notices: Notice[]
}

export interface DeskSession {
  desk: HomeworkDesk
  presenter: CapturingPresenter
  /** Problems from the initial load, e.g. a document that does not exist yet. */
  loadWarnings: string[]
  run<K extends TaskKind>(kind: K, params: TaskParamsMap[K]): Promise<TaskReport>
}

function failure(notices: Notice[]): CommandError | null {
  const errors = notices.filter((notice) => notice.severity === 'error')
  if (errors.length === 0) {
    return null
  }
  return {
    code: 'TASK_FAILED',
    message: errors[0].message,
    details: errors.length > 1 ? errors.slice(1).map((notice) => notice.message).join('\n') : undefined,
  }
}

/**
 * Opens the desk for one command: loads the document, lets `work` submit
 * tasks, and stops the desk when done.
 */
export async function withDeskSession<T>(
  context: CliContext,
  options: { document?: string },
  work: (session: DeskSession) => Promise<T>
): Promise<T> {
  const home = resolveDeskHome(context.env)
  const persisted = loadPersistedConfig(home, context.logger)
  const logger = context.logger ?? createRootLogger(persisted, context.env)
  const config = resolveDeskConfig(home, persisted, context.env)
  const documentPath = options.document
    ? path.resolve(context.cwd, options.document)
    : config.documentPath

  const presenter = new CapturingPresenter()
  const desk = new HomeworkDesk({
    config: { ...config, documentPath },
    presenter,
    logger,
    clock: context.clock,
  })

  desk.start()
  try {
    await desk.whenIdle()
    const loadWarnings = presenter
      .takeNotices()
      .filter((notice) => notice.severity !== 'info')
      .map((notice) => notice.message)

    const session: DeskSession = {
      desk,
      presenter,
      loadWarnings,
      async run(kind, params) {
        desk.submit(kind, params)
        await desk.whenIdle()
        const notices = presenter.takeNotices()
        const error = failure(notices)
        if (error) {
          throw error
        }
        return { notices }
      },
    }
    return await work(session)
  } finally {
    desk.stop()
  }
}
