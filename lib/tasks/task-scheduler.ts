/**
 * Task Scheduler - named daily actions at a local wall-clock time
 *
 * Each task owns one timer set to its next run. After a run finishes
 * (or fails) the task schedules itself again for the following day.
 */

import type { Logger } from '../logger'

export type TaskAction<Args extends unknown[]> = (...args: Args) => void | Promise<void>

export interface TaskInfo {
  name: string
  description: string
  scheduleTime: string
  nextRunAt: number
  runCount: number
  lastRunAt: number | null
}

interface ScheduledTask {
  name: string
  description: string
  hour: number
  minute: number
  run: () => void | Promise<void>
  timer: ReturnType<typeof setTimeout> | null
  nextRunAt: number
  runCount: number
  lastRunAt: number | null
}

const TIME_FORMAT = /^([01]?\d|2[0-3]):([0-5]\d)$/

function formatTime(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`
}

/** Next occurrence of hour:minute strictly after `now` */
export function nextOccurrence(hour: number, minute: number, now: Date): Date {
  const nextRun = new Date(now)
  nextRun.setHours(hour, minute, 0, 0)
  if (now >= nextRun) {
    nextRun.setDate(nextRun.getDate() + 1)
  }
  return nextRun
}

export class TaskScheduler {
  private tasks = new Map<string, ScheduledTask>()
  private stopped = false

  constructor(private logger: Logger) {}

  /**
   * Register (or replace) a daily task. Returns a confirmation for the
   * user, or an explanation when the time is not HH:MM.
   */
  addTask<Args extends unknown[]>(
    name: string,
    description: string,
    scheduleTime: string,
    action: TaskAction<Args>,
    actionArgs: Args,
  ): string {
    const match = TIME_FORMAT.exec(scheduleTime.trim())
    if (!match) {
      this.logger.warn(`Rejected task '${name}': invalid time '${scheduleTime}'`)
      return `Sorry, I couldn't schedule '${name}': '${scheduleTime}' is not a valid time. Please use HH:MM.`
    }

    const existing = this.tasks.get(name)
    if (existing) {
      this.clearTimer(existing)
      this.logger.info(`Replacing existing task '${name}'`)
    }

    const task: ScheduledTask = {
      name,
      description,
      hour: Number(match[1]),
      minute: Number(match[2]),
      run: () => action(...actionArgs),
      timer: null,
      nextRunAt: 0,
      runCount: 0,
      lastRunAt: null,
    }
    this.tasks.set(name, task)
    this.stopped = false
    this.schedule(task)

    const time = formatTime(task.hour, task.minute)
    this.logger.info(`Task '${name}' scheduled daily at ${time}: ${description}`)
    return `Task '${name}' scheduled daily at ${time}.`
  }

  removeTask(name: string): string {
    const task = this.tasks.get(name)
    if (!task) {
      return `No task named '${name}' is scheduled.`
    }
    this.clearTimer(task)
    this.tasks.delete(name)
    this.logger.info(`Task '${name}' removed`)
    return `Task '${name}' has been cancelled.`
  }

  hasTask(name: string): boolean {
    return this.tasks.has(name)
  }

  listTasks(): TaskInfo[] {
    return Array.from(this.tasks.values()).map(task => ({
      name: task.name,
      description: task.description,
      scheduleTime: formatTime(task.hour, task.minute),
      nextRunAt: task.nextRunAt,
      runCount: task.runCount,
      lastRunAt: task.lastRunAt,
    }))
  }

  /** Clear every timer. Registered tasks are dropped. */
  stop(): void {
    this.stopped = true
    for (const task of this.tasks.values()) {
      this.clearTimer(task)
    }
    const count = this.tasks.size
    this.tasks.clear()
    this.logger.info(`Scheduler stopped (${count} task(s) cleared)`)
  }

  // -- Internals -----------------------------------------------------------

  private schedule(task: ScheduledTask): void {
    const now = new Date()
    const nextRun = nextOccurrence(task.hour, task.minute, now)
    const timeUntilRun = nextRun.getTime() - now.getTime()
    task.nextRunAt = nextRun.getTime()

    this.clearTimer(task)
    task.timer = setTimeout(() => {
      task.timer = null
      this.execute(task)
        .catch(err => {
          this.logger.error(`Task '${task.name}' failed:`, err)
        })
        .finally(() => {
          // Reschedule only if this task is still the registered one
          if (!this.stopped && this.tasks.get(task.name) === task) {
            this.schedule(task)
          }
        })
    }, timeUntilRun)

    this.logger.debug(`Next run of '${task.name}' in ${Math.round(timeUntilRun / 60000)} min`)
  }

  private async execute(task: ScheduledTask): Promise<void> {
    task.runCount++
    task.lastRunAt = Date.now()
    this.logger.info(`Running task '${task.name}'`)
    await task.run()
  }

  private clearTimer(task: ScheduledTask): void {
    if (task.timer) {
      clearTimeout(task.timer)
      task.timer = null
    }
  }
}
