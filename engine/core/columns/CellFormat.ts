/**
 * Cell Display Formats
 *
 * Format strings for numeric and date cells:
 * - Number: 0, 0.00, #,##0, #,##0.00, 0%, 0.0%
 * - Date: yyyy, yy, MM, M, dd, d with literal separators (yyyy-MM-dd, dd/MM/yy)
 *
 * Output is locale-independent ('.' decimal, ',' grouping). Parsed formats
 * are cached per format string.
 */

export type DateFormatToken =
  | { type: 'year'; width: 2 | 4 }
  | { type: 'month'; width: 1 | 2 }
  | { type: 'day'; width: 1 | 2 }
  | { type: 'literal'; value: string };

export type ParsedCellFormat =
  | { kind: 'number'; decimals: number; grouping: boolean; percent: boolean }
  | { kind: 'date'; tokens: DateFormatToken[] };

/**
 * Raised for format strings that are neither a number nor a date pattern
 */
export class CellFormatSyntaxError extends Error {
  constructor(format: string, detail: string) {
    super(`Invalid format '${format}': ${detail}`);
    this.name = 'CellFormatSyntaxError';
  }
}

const NUMBER_PATTERN = /^([#0,]*0|#)(?:\.(0+))?(%)?$/;
const DATE_TOKEN = /yyyy|yy|MM|M|dd|d|[^yMd]+/y;

const cache: Map<string, ParsedCellFormat> = new Map();

function parseDateTokens(format: string): DateFormatToken[] {
  const tokens: DateFormatToken[] = [];
  DATE_TOKEN.lastIndex = 0;

  while (DATE_TOKEN.lastIndex < format.length) {
    const start = DATE_TOKEN.lastIndex;
    const match = DATE_TOKEN.exec(format);
    if (!match) {
      throw new CellFormatSyntaxError(format, `unexpected '${format.slice(start)}'`);
    }
    const text = match[0];
    switch (text) {
      case 'yyyy': tokens.push({ type: 'year', width: 4 }); break;
      case 'yy': tokens.push({ type: 'year', width: 2 }); break;
      case 'MM': tokens.push({ type: 'month', width: 2 }); break;
      case 'M': tokens.push({ type: 'month', width: 1 }); break;
      case 'dd': tokens.push({ type: 'day', width: 2 }); break;
      case 'd': tokens.push({ type: 'day', width: 1 }); break;
      default: tokens.push({ type: 'literal', value: text });
    }
  }

  return tokens;
}

/**
 * Parse a display format string
 */
export function parseCellFormat(format: string): ParsedCellFormat {
  const cached = cache.get(format);
  if (cached) return cached;

  let parsed: ParsedCellFormat;
  const numberMatch = NUMBER_PATTERN.exec(format);
  if (numberMatch) {
    parsed = {
      kind: 'number',
      decimals: numberMatch[2]?.length ?? 0,
      grouping: numberMatch[1].includes(','),
      percent: numberMatch[3] !== undefined,
    };
  } else if (/[yMd]/.test(format)) {
    parsed = { kind: 'date', tokens: parseDateTokens(format) };
  } else {
    throw new CellFormatSyntaxError(format, 'not a number or date pattern');
  }

  cache.set(format, parsed);
  return parsed;
}

/**
 * Format a number with a parsed number format
 */
export function formatNumber(
  value: number,
  format: Extract<ParsedCellFormat, { kind: 'number' }>
): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  const scaled = format.percent ? value * 100 : value;
  const [integerPart, fractionPart] = Math.abs(scaled).toFixed(format.decimals).split('.');
  const integerText = format.grouping
    ? integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',')
    : integerPart;
  const sign = scaled < 0 && Number(integerPart + '.' + (fractionPart ?? '0')) !== 0 ? '-' : '';

  return `${sign}${integerText}${fractionPart !== undefined ? '.' + fractionPart : ''}${format.percent ? '%' : ''}`;
}

/**
 * Format the local calendar date of a Date with a parsed date format
 */
export function formatDate(
  date: Date,
  format: Extract<ParsedCellFormat, { kind: 'date' }>
): string {
  if (isNaN(date.getTime())) {
    return '';
  }

  return format.tokens
    .map((token) => {
      switch (token.type) {
        case 'year':
          return token.width === 4
            ? String(date.getFullYear()).padStart(4, '0')
            : String(date.getFullYear() % 100).padStart(2, '0');
        case 'month':
          return String(date.getMonth() + 1).padStart(token.width, '0');
        case 'day':
          return String(date.getDate()).padStart(token.width, '0');
        case 'literal':
          return token.value;
      }
    })
    .join('');
}
