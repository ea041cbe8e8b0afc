export {
  daily,
  DailySchedule,
  hourly,
  HourlySchedule,
  weekly,
  WeeklySchedule,
  type Weekday,
} from './calendar-schedules.js';
export { DelaySchedule, every } from './delay-schedule.js';
export { descriptorParser, parseDuration } from './descriptor-parser.js';
