import { FIELD_CODE_CHARS } from '../../../lib/form';

export interface UnsupportedFunction {
  readonly name: string;
  readonly alternative: string;
  /** Mechanical replacement for one call; undefined when the arity is wrong. */
  readonly rewrite?: (args: ReadonlyArray<string>) => string | undefined;
}

const DATE_PART = (format: string) => (args: ReadonlyArray<string>) =>
  args.length === 1 ? `DATE_FORMAT(${args[0]}, "${format}")` : undefined;

/** Checked in this order; the first one found is reported. */
export const UNSUPPORTED_FUNCTIONS: ReadonlyArray<UnsupportedFunction> = [
  {
    name: 'DAYS_BETWEEN',
    alternative:
      'Take the difference of two dates with DATE_FORMAT(date1, "YYYY/MM/DD") - DATE_FORMAT(date2, "YYYY/MM/DD")',
    rewrite: (args) =>
      args.length === 2
        ? `ROUNDDOWN(DATE_FORMAT(${args[0]}, "YYYY/MM/DD") - DATE_FORMAT(${args[1]}, "YYYY/MM/DD"), 0)`
        : undefined,
  },
  {
    name: 'AVERAGE',
    alternative: 'Compute an average as SUM(field) / COUNT(field)',
  },
  {
    name: 'CONCATENATE',
    alternative: 'Join strings with the & operator, e.g. text1 & " " & text2',
    rewrite: (args) => (args.length > 0 ? args.join(' & ') : undefined),
  },
  {
    name: 'VLOOKUP',
    alternative: 'Use a lookup field to copy values from another app',
  },
  {
    name: 'COUNTIF',
    alternative: 'Count conditionally with SUM(IF(condition, 1, 0))',
  },
  {
    name: 'SUMIF',
    alternative: 'Sum conditionally with SUM(IF(condition, value, 0))',
  },
  {
    name: 'TODAY',
    alternative:
      'Use a DATE field with defaultNowValue: true to capture the current date',
  },
  {
    name: 'NOW',
    alternative:
      'Use a DATETIME field with defaultNowValue: true to capture the current date and time',
  },
  {
    name: 'MONTH',
    alternative: 'Get the month with DATE_FORMAT(date, "MM")',
    rewrite: DATE_PART('MM'),
  },
  {
    name: 'YEAR',
    alternative: 'Get the year with DATE_FORMAT(date, "YYYY")',
    rewrite: DATE_PART('YYYY'),
  },
  {
    name: 'DAY',
    alternative: 'Get the day of month with DATE_FORMAT(date, "DD")',
    rewrite: DATE_PART('DD'),
  },
];

export interface UnsupportedFunctionMatch {
  readonly fn: UnsupportedFunction;
  /** Whole expression with every unsupported call rewritten, when that is possible. */
  readonly suggestion?: string;
}

interface CallSite {
  readonly start: number;
  readonly end: number;
  readonly args: ReadonlyArray<string>;
}

function callPattern(name: string): RegExp {
  return new RegExp(`\\b${name}\\s*\\(`, 'i');
}

/** First call of `name` with balanced parentheses, or undefined. */
function findCall(expression: string, name: string): CallSite | undefined {
  const m = callPattern(name).exec(expression);
  if (!m) return undefined;

  const args: string[] = [];
  let depth = 0;
  let quoted = false;
  let argStart = m.index + m[0].length;
  for (let i = argStart; i < expression.length; i++) {
    const ch = expression[i];
    if (ch === '"') {
      quoted = !quoted;
    } else if (quoted) {
      continue;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ',' && depth === 0) {
      args.push(expression.slice(argStart, i).trim());
      argStart = i + 1;
    } else if (ch === ')') {
      if (depth > 0) {
        depth--;
        continue;
      }
      const last = expression.slice(argStart, i).trim();
      if (last !== '' || args.length > 0) args.push(last);
      return { start: m.index, end: i + 1, args };
    }
  }
  return undefined;
}

function rewriteAll(
  expression: string,
  fn: UnsupportedFunction,
): string | undefined {
  if (!fn.rewrite) return undefined;
  let out = expression;
  for (let call = findCall(out, fn.name); call; call = findCall(out, fn.name)) {
    const replaced = fn.rewrite(call.args);
    if (replaced === undefined) return undefined;
    // keep precedence when the call sits inside a larger expression
    const whole = call.start === 0 && call.end === out.length;
    const text = fn.name === 'CONCATENATE' && !whole ? `(${replaced})` : replaced;
    out = out.slice(0, call.start) + text + out.slice(call.end);
  }
  return out;
}

function containsUnsupported(expression: string): boolean {
  return UNSUPPORTED_FUNCTIONS.some((f) => callPattern(f.name).test(expression));
}

/**
 * Report the first unsupported function the expression calls.
 * The suggestion is offered only when every unsupported call could be rewritten.
 */
export function findUnsupportedFunction(
  expression: string,
): UnsupportedFunctionMatch | undefined {
  const fn = UNSUPPORTED_FUNCTIONS.find((f) =>
    callPattern(f.name).test(expression),
  );
  if (!fn) return undefined;

  let rewritten: string | undefined = expression;
  for (const f of UNSUPPORTED_FUNCTIONS) {
    if (rewritten === undefined) break;
    if (callPattern(f.name).test(rewritten)) rewritten = rewriteAll(rewritten, f);
  }
  if (rewritten === undefined || containsUnsupported(rewritten)) return { fn };
  return { fn, suggestion: rewritten };
}

const STRING_LITERAL = /"[^"]*"/g;
const DECIMAL_LITERAL = /\b\d+\.\d+\b/g;
const PLACEHOLDER = /\uE000(\d+)\uE001/g;
const DOTTED_REFERENCE = new RegExp(
  `(?:[${FIELD_CODE_CHARS}]+\\.)+([${FIELD_CODE_CHARS}]+)`,
  'gu',
);

/**
 * Detect `table.field` references. String and decimal literals are ignored.
 * Returns the expression with every table prefix removed, or undefined when
 * there is none.
 */
export function stripTablePrefixes(expression: string): string | undefined {
  const saved: string[] = [];
  const protect = (literal: string): string => {
    saved.push(literal);
    return `\uE000${saved.length - 1}\uE001`;
  };
  const masked = expression
    .replace(STRING_LITERAL, protect)
    .replace(DECIMAL_LITERAL, protect);

  if (!new RegExp(DOTTED_REFERENCE.source, 'u').test(masked)) return undefined;

  return masked
    .replace(DOTTED_REFERENCE, '$1')
    .replace(PLACEHOLDER, (_m: string, i: string) => saved[Number(i)]);
}
