/**
 * Best-effort date parsing for the date strings found on blog pages.
 *
 * Patterns are tried in order and the first full-string match wins. The
 * offset-bearing ISO form comes first so an offset is never dropped by a
 * looser pattern. Strings without an offset are read as UTC.
 */

const FULL_MONTHS = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december',
];
const SHORT_MONTHS = FULL_MONTHS.map(m => m.slice(0, 3));

interface Fields {
    year: number;
    month: number;
    day: number;
    hour?: number;
    minute?: number;
    second?: number;
    /** Minutes east of UTC */
    offset?: number;
}

interface DatePattern {
    name: string;
    regex: RegExp;
    fields: (m: RegExpExecArray) => Fields | undefined;
}

function monthIndex(names: string[], raw: string): number | undefined {
    const i = names.indexOf(raw.toLowerCase());
    return i < 0 ? undefined : i + 1;
}

function parseOffset(raw: string): number | undefined {
    if (raw === 'Z' || raw === 'z') return 0;
    const m = /^([+-])(\d{2}):?(\d{2})$/.exec(raw);
    if (!m) return undefined;
    const hours = Number(m[2]);
    const minutes = Number(m[3]);
    if (hours > 23 || minutes > 59) return undefined;
    const total = hours * 60 + minutes;
    return m[1] === '-' ? -total : total;
}

const DATE = String.raw`(\d{4})-(\d{1,2})-(\d{1,2})`;
const TIME = String.raw`(\d{1,2}):(\d{1,2}):(\d{1,2})`;

const PATTERNS: DatePattern[] = [
    {
        name: 'iso-offset',
        regex: new RegExp(`^${DATE}T${TIME}(Z|z|[+-]\\d{2}:?\\d{2})$`),
        fields: m => {
            const offset = parseOffset(m[7]);
            if (offset === undefined) return undefined;
            return {
                year: Number(m[1]), month: Number(m[2]), day: Number(m[3]),
                hour: Number(m[4]), minute: Number(m[5]), second: Number(m[6]),
                offset,
            };
        },
    },
    {
        name: 'iso-local',
        regex: new RegExp(`^${DATE}[ T]${TIME}$`),
        fields: m => ({
            year: Number(m[1]), month: Number(m[2]), day: Number(m[3]),
            hour: Number(m[4]), minute: Number(m[5]), second: Number(m[6]),
        }),
    },
    {
        name: 'iso-date',
        regex: new RegExp(`^${DATE}$`),
        fields: m => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }),
    },
    {
        name: 'month-day-year',
        regex: /^([A-Za-z]+) (\d{1,2}), (\d{4})$/,
        fields: m => {
            const month = monthIndex(FULL_MONTHS, m[1]);
            return month ? { year: Number(m[3]), month, day: Number(m[2]) } : undefined;
        },
    },
    {
        name: 'mon-day-year',
        regex: /^([A-Za-z]{3}) (\d{1,2}), (\d{4})$/,
        fields: m => {
            const month = monthIndex(SHORT_MONTHS, m[1]);
            return month ? { year: Number(m[3]), month, day: Number(m[2]) } : undefined;
        },
    },
    {
        name: 'day-month-year',
        regex: /^(\d{1,2}) ([A-Za-z]+) (\d{4})$/,
        fields: m => {
            const month = monthIndex(FULL_MONTHS, m[2]);
            return month ? { year: Number(m[3]), month, day: Number(m[1]) } : undefined;
        },
    },
    {
        name: 'day-mon-year',
        regex: /^(\d{1,2}) ([A-Za-z]{3}) (\d{4})$/,
        fields: m => {
            const month = monthIndex(SHORT_MONTHS, m[2]);
            return month ? { year: Number(m[3]), month, day: Number(m[1]) } : undefined;
        },
    },
];

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
    const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
    return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

function toDate(f: Fields): Date | undefined {
    const hour = f.hour ?? 0;
    const minute = f.minute ?? 0;
    const second = f.second ?? 0;
    if (f.year < 1 || f.month < 1 || f.month > 12) return undefined;
    if (f.day < 1 || f.day > daysInMonth(f.year, f.month)) return undefined;
    if (hour > 23 || minute > 59 || second > 59) return undefined;

    const date = new Date(0);
    date.setUTCFullYear(f.year, f.month - 1, f.day);
    date.setUTCHours(hour, minute, second, 0);
    return new Date(date.getTime() - (f.offset ?? 0) * 60_000);
}

/**
 * Parse a date string in one of the formats blog pages use.
 * Returns undefined for empty or unrecognised input; never throws.
 */
export function parseDateString(raw: string | null | undefined): Date | undefined {
    const value = raw?.trim();
    if (!value) return undefined;

    for (const pattern of PATTERNS) {
        const match = pattern.regex.exec(value);
        if (!match) continue;
        const fields = pattern.fields(match);
        const date = fields && toDate(fields);
        if (date) return date;
    }
    return undefined;
}
