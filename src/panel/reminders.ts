import type { MessageQueue } from "@deskpanel/ticker-queue";
import type { Reminder } from "../config/schema.js";

export const REMINDER_PRIORITY = 5;
export const REMINDER_TTL_MS = 60_000;

export interface ReminderScheduleOptions {
  now?: () => Date;
  ttlMs?: number;
  priority?: number;
}

export interface ReminderSchedule {
  /** Pushes every reminder due this minute that has not fired today; returns their texts. */
  check(): string[];
}

const pad2 = (value: number): string => String(value).padStart(2, "0");

export function formatClockTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

function dayKey(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function createReminderSchedule(
  reminders: readonly Reminder[],
  queue: MessageQueue,
  options: ReminderScheduleOptions = {}
): ReminderSchedule {
  const now = options.now ?? (() => new Date());
  const ttlMs = options.ttlMs ?? REMINDER_TTL_MS;
  const priority = options.priority ?? REMINDER_PRIORITY;
  // reminder index -> day it last fired
  const firedOn = new Map<number, string>();

  return {
    check() {
      const at = now();
      const time = formatClockTime(at);
      const day = dayKey(at);
      const fired: string[] = [];

      reminders.forEach((reminder, index) => {
        if (reminder.time !== time || firedOn.get(index) === day) {
          return;
        }
        firedOn.set(index, day);
        queue.push(reminder.text, ttlMs, priority);
        fired.push(reminder.text);
      });
      return fired;
    }
  };
}
