import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export const SHIFT_DATE_FORMAT = 'YYYY-MM-DD';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const shiftDateOf = (moment: Date, tz: string): string => dayjs(moment).tz(tz).format(SHIFT_DATE_FORMAT);

export const timeLabelOf = (moment: Date, tz: string): string => dayjs(moment).tz(tz).format('HHmmss');

export const displayDate = (shiftDate: string): string => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(shiftDate)) {
    return shiftDate;
  }
  return dayjs(shiftDate).format('DD.MM.YYYY');
};

export const timestampOf = (moment: Date, tz: string): string => dayjs(moment).tz(tz).format('YYYY-MM-DD HH:mm:ss');
