/**
 * Reminder Service - daily spoken reminders on top of the task scheduler
 */

import type { Logger } from '../logger'
import type { OutputChannels, ReminderScheduling } from '@/types/dialogue'
import type { TaskScheduler } from './task-scheduler'

export function defaultReminderName(message: string, timeStr: string): string {
  return `daily_reminder_${timeStr.replace(/:/g, '')}_${message.slice(0, 10).replace(/ /g, '_')}`
}

export class ReminderService implements ReminderScheduling {
  constructor(
    private scheduler: TaskScheduler,
    private output: OutputChannels,
    private logger: Logger,
  ) {}

  setupReminder(message: string, timeStr: string, reminderName?: string): string {
    const name = reminderName || defaultReminderName(message, timeStr)
    return this.scheduler.addTask(
      name,
      `Speak reminder: ${message}`,
      timeStr,
      (text: string) => this.speakReminder(text),
      [message],
    )
  }

  cancelReminder(reminderName: string): string {
    return this.scheduler.removeTask(reminderName)
  }

  private async speakReminder(message: string): Promise<void> {
    this.logger.info(`Executing reminder: ${message}`)
    try {
      await this.output.speak(`Reminder: ${message}`)
    } catch (err) {
      this.logger.error(`Error speaking reminder '${message}':`, err)
    }
  }
}
