export {
  OVERDUE_PROMPT_TTL_MS,
  ReminderDispatcher,
  missedReminders,
  nextReminderAt,
  type OverdueOutcome,
  type ReminderDispatcherOptions,
  type ReminderTickSummary,
} from './reminder-dispatcher';
