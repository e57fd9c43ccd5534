import { ValidationError } from "./httpError";
import { getZonedParts, zonedTimeToUtc } from "./dateUtils";

export interface SlotTime {
  hour: number;
  minute: number;
}

const SLOT_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

export function parseSlotTime(value: string): SlotTime {
  const match = SLOT_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid slot time "${value}"`, {
      slot: "expected HH:mm in 24-hour time",
    });
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export const formatSlotTime = ({ hour, minute }: SlotTime): string =>
  `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;

/**
 * Sorts the slot table by time of day and drops duplicates. Callers may pass
 * the table in any order.
 */
export function normalizeSlots(slots: readonly SlotTime[]): SlotTime[] {
  if (slots.length === 0) {
    throw new ValidationError("At least one daily slot is required", {
      slots: "must not be empty",
    });
  }

  const byMinute = new Map<number, SlotTime>();
  for (const slot of slots) {
    if (
      !Number.isInteger(slot.hour) ||
      !Number.isInteger(slot.minute) ||
      slot.hour < 0 ||
      slot.hour > 23 ||
      slot.minute < 0 ||
      slot.minute > 59
    ) {
      throw new ValidationError(`Invalid slot ${JSON.stringify(slot)}`, {
        slots: "hour must be 0-23 and minute 0-59",
      });
    }
    byMinute.set(slot.hour * 60 + slot.minute, slot);
  }

  return [...byMinute.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, slot]) => ({ hour: slot.hour, minute: slot.minute }));
}

/**
 * Next publication instant for an account.
 *
 * The result is the earliest configured slot strictly after both the
 * account's chain tail (if any) and `now`. A slot that falls exactly on the
 * anchor counts as taken. When the anchor's day has no later slot the first
 * slot of the following day is used. Slots are wall-clock times in
 * `timezone`; inputs and output are absolute instants.
 */
export function nextSlot(
  accountChainTail: Date | null,
  now: Date,
  dailySlots: readonly SlotTime[],
  timezone: string
): Date {
  const slots = normalizeSlots(dailySlots);
  const anchor =
    accountChainTail && accountChainTail.getTime() > now.getTime()
      ? accountChainTail
      : now;

  const day = getZonedParts(anchor, timezone);

  for (const slot of slots) {
    const candidate = zonedTimeToUtc(
      { year: day.year, month: day.month, day: day.day, ...slot },
      timezone
    );
    if (candidate.getTime() > anchor.getTime()) {
      return candidate;
    }
  }

  return zonedTimeToUtc(
    { year: day.year, month: day.month, day: day.day + 1, ...slots[0] },
    timezone
  );
}
