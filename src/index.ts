export { Calendar } from './calendar/calendar';
export { CalendarEvent, Reminder } from './calendar/event';
export { Day } from './calendar/day';
export * from './common/errors';
export { SLOT_MINUTES, SLOTS_PER_DAY, generateDaySlots } from './common/time';
export { loadConfig, validateConfig, getDefaultConfig } from './common/config';
export * from './types/calendar';
export * from './types/config';
