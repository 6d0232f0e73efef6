/**
 * Time Utils - spoken time and date
 */

import type { TimeTeller } from '@/types/dialogue'

export function tellTime(now: Date = new Date()): string {
  const hours = now.getHours()
  const minutes = String(now.getMinutes()).padStart(2, '0')
  const period = hours < 12 ? 'AM' : 'PM'
  const hour12 = hours % 12 === 0 ? 12 : hours % 12
  return `It's ${hour12}:${minutes} ${period}.`
}

export function tellDate(now: Date = new Date(), locale = 'en-US'): string {
  const formatted = now.toLocaleDateString(locale, {
    weekday: 'long',
    month: 'long',
    day: 'numeric',
    year: 'numeric',
  })
  return `Today is ${formatted}.`
}

/** TimeTeller bound to a locale and a clock */
export function createTimeTeller(locale: string, clock: () => Date = () => new Date()): TimeTeller {
  return {
    tellTime: () => tellTime(clock()),
    tellDate: () => tellDate(clock(), locale),
  }
}
