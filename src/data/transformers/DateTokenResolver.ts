// src/data/transformers/DateTokenResolver.ts

import { ConfigurationManager, DEFAULT_DATE_FORMAT } from '../../core/configuration/ConfigurationManager';
import { logger } from '../../core/utils/Logger';

export type Clock = () => Date;

export const DEFAULT_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const WEEKDAYS = ['SUNDAY', 'MONDAY', 'TUESDAY', 'WEDNESDAY', 'THURSDAY', 'FRIDAY', 'SATURDAY'] as const;
const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December'
] as const;
const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const TOKEN_PATTERN = new RegExp(
    '<(TODAY|NOW|YESTERDAY|TOMORROW)>' +
    `|<NEXT_(${WEEKDAYS.join('|')})>` +
    '|<(PLUS|MINUS)_(\\d+)_(DAY|WEEK|MONTH|YEAR)S?>',
    'g'
);

// Longest pattern letters first so `yyyy` wins over `yy` and `MMMM` over `MM`.
const FORMAT_PATTERN = /'(?:[^']|'')*'|yyyy|yy|MMMM|MMM|MM|M|dd|d|HH|mm|ss|EEEE|EEE/g;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number, length: number = 2): string {
    return String(value).padStart(length, '0');
}

function startOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function daysInMonth(year: number, month: number): number {
    return new Date(year, month + 1, 0).getDate();
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** Clamps to the last day of the target month: Jan 31 + 1 month is Feb 28 or 29. */
export function addMonths(date: Date, months: number): Date {
    const target = new Date(date.getFullYear(), date.getMonth() + months, 1);
    const day = Math.min(date.getDate(), daysInMonth(target.getFullYear(), target.getMonth()));
    return new Date(target.getFullYear(), target.getMonth(), day);
}

export function formatDate(date: Date, format: string): string {
    return format.replace(FORMAT_PATTERN, token => {
        switch (token) {
            case 'yyyy': return pad(date.getFullYear(), 4);
            case 'yy': return pad(date.getFullYear() % 100);
            case 'MMMM': return MONTH_NAMES[date.getMonth()] ?? '';
            case 'MMM': return (MONTH_NAMES[date.getMonth()] ?? '').slice(0, 3);
            case 'MM': return pad(date.getMonth() + 1);
            case 'M': return String(date.getMonth() + 1);
            case 'dd': return pad(date.getDate());
            case 'd': return String(date.getDate());
            case 'HH': return pad(date.getHours());
            case 'mm': return pad(date.getMinutes());
            case 'ss': return pad(date.getSeconds());
            case 'EEEE': return DAY_NAMES[date.getDay()] ?? '';
            case 'EEE': return (DAY_NAMES[date.getDay()] ?? '').slice(0, 3);
            default: {
                const literal = token.slice(1, -1);
                return literal === '' ? "'" : literal.replace(/''/g, "'");
            }
        }
    });
}

/**
 * Replaces relative-date tokens such as `<TODAY>`, `<NEXT_FRIDAY>` or
 * `<PLUS_3_DAYS>` with formatted dates. Bracketed text that is not a known
 * token is left as it is.
 */
export class DateTokenResolver {
    private readonly clock: Clock;
    private readonly defaultFormat: string;

    constructor(options: { clock?: Clock; defaultFormat?: string } = {}) {
        this.clock = options.clock ?? (() => new Date());
        this.defaultFormat = options.defaultFormat ?? ConfigurationManager.get('DATE_FORMAT', DEFAULT_DATE_FORMAT);
    }

    getDefaultFormat(): string {
        return this.defaultFormat;
    }

    now(): Date {
        return this.clock();
    }

    today(): Date {
        return startOfDay(this.clock());
    }

    containsTokens(text: string): boolean {
        return new RegExp(TOKEN_PATTERN.source).test(text);
    }

    resolve(template: string, format: string = this.defaultFormat): string {
        if (!template || !template.includes('<')) {
            return template;
        }

        const now = this.clock();
        const today = startOfDay(now);

        const resolved = template.replace(
            TOKEN_PATTERN,
            (match: string, simple?: string, weekday?: string, sign?: string, amount?: string, unit?: string) => {
                if (simple !== undefined) {
                    return this.resolveSimple(simple, now, today, format);
                }
                if (weekday !== undefined) {
                    return formatDate(this.nextWeekday(today, weekday), format);
                }
                if (sign !== undefined && amount !== undefined && unit !== undefined) {
                    const offset = (sign === 'MINUS' ? -1 : 1) * parseInt(amount, 10);
                    return formatDate(this.shift(today, offset, unit), format);
                }
                return match;
            }
        );

        if (resolved !== template) {
            logger.debug('Resolved date tokens', { template, resolved });
        }
        return resolved;
    }

    formatDate(date: Date, format: string = this.defaultFormat): string {
        return formatDate(date, format);
    }

    /** Whole calendar days from `from` to `to`; negative when `to` is earlier. */
    daysBetween(from: Date, to: Date): number {
        return Math.round((startOfDay(to).getTime() - startOfDay(from).getTime()) / MS_PER_DAY);
    }

    isFuture(date: Date): boolean {
        return this.daysBetween(this.today(), date) > 0;
    }

    isPast(date: Date): boolean {
        return this.daysBetween(this.today(), date) < 0;
    }

    isToday(date: Date): boolean {
        return this.daysBetween(this.today(), date) === 0;
    }

    private resolveSimple(token: string, now: Date, today: Date, format: string): string {
        switch (token) {
            case 'NOW':
                return formatDate(now, DEFAULT_DATETIME_FORMAT);
            case 'YESTERDAY':
                return formatDate(addDays(today, -1), format);
            case 'TOMORROW':
                return formatDate(addDays(today, 1), format);
            default:
                return formatDate(today, format);
        }
    }

    /** Strictly after `today`: asking for Friday on a Friday gives the next week's. */
    private nextWeekday(today: Date, weekday: string): Date {
        const target = WEEKDAYS.findIndex(name => name === weekday);
        const diff = (target - today.getDay() + 7) % 7;
        return addDays(today, diff === 0 ? 7 : diff);
    }

    private shift(today: Date, amount: number, unit: string): Date {
        switch (unit) {
            case 'WEEK':
                return addDays(today, amount * 7);
            case 'MONTH':
                return addMonths(today, amount);
            case 'YEAR':
                return addMonths(today, amount * 12);
            default:
                return addDays(today, amount);
        }
    }
}
