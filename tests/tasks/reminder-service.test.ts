/**
 * Reminder Service Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ReminderService, defaultReminderName } from '@/lib/tasks/reminder-service'
import { TaskScheduler } from '@/lib/tasks/task-scheduler'
import { createLoggerMock, createOutputMock } from '../test-utils/service-mocks'

const HOUR = 60 * 60 * 1000

describe('defaultReminderName', () => {
  it('combines the time and the start of the message', () => {
    expect(defaultReminderName('take pills', '10:00')).toBe('daily_reminder_1000_take_pills')
    expect(defaultReminderName('call the plumber back', '08:15')).toBe('daily_reminder_0815_call_the_p')
  })
})

describe('ReminderService', () => {
  let scheduler: TaskScheduler
  let output: ReturnType<typeof createOutputMock>
  let logger: ReturnType<typeof createLoggerMock>
  let reminders: ReminderService

  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date(2025, 2, 14, 9, 0, 0))
    logger = createLoggerMock()
    scheduler = new TaskScheduler(logger)
    output = createOutputMock()
    reminders = new ReminderService(scheduler, output, logger)
  })

  afterEach(() => {
    scheduler.stop()
    vi.useRealTimers()
  })

  it('speaks the reminder exactly once at the scheduled time', async () => {
    const confirmation = reminders.setupReminder('take pills', '10:00')
    expect(confirmation).toBe("Task 'daily_reminder_1000_take_pills' scheduled daily at 10:00.")

    await vi.advanceTimersByTimeAsync(HOUR)

    expect(output.speak).toHaveBeenCalledTimes(1)
    expect(output.speak).toHaveBeenCalledWith('Reminder: take pills')
  })

  it('registers the task with a readable description', () => {
    reminders.setupReminder('water plants', '18:30', 'plants')

    expect(scheduler.listTasks()).toEqual([
      expect.objectContaining({ name: 'plants', description: 'Speak reminder: water plants', scheduleTime: '18:30' }),
    ])
  })

  it('passes an invalid time explanation through', () => {
    expect(reminders.setupReminder('nap', 'noon-ish', 'nap')).toBe(
      "Sorry, I couldn't schedule 'nap': 'noon-ish' is not a valid time. Please use HH:MM.",
    )
  })

  it('logs a speech failure instead of failing the task', async () => {
    output.speak.mockRejectedValue(new Error('speaker fault'))
    reminders.setupReminder('stretch', '10:00')

    await vi.advanceTimersByTimeAsync(HOUR)

    expect(logger.error).toHaveBeenCalledWith("Error speaking reminder 'stretch':", expect.any(Error))
    expect(logger.error).not.toHaveBeenCalledWith(expect.stringContaining('failed:'), expect.anything())
  })

  it('cancels a reminder by name', async () => {
    reminders.setupReminder('stretch', '10:00', 'stretch')

    expect(reminders.cancelReminder('stretch')).toBe("Task 'stretch' has been cancelled.")
    await vi.advanceTimersByTimeAsync(HOUR)
    expect(output.speak).not.toHaveBeenCalled()
  })
})
