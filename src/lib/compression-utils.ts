/**
 * Shared utilities for the compression pipeline
 */

// ==========================================
// NUMERIC HELPERS
// ==========================================

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * File-name friendly tolerance label: 12.5 -> "12_5".
 */
export function toleranceLabel(tolerance: number): string {
  return String(tolerance).replace(/[^0-9]+/g, '_').replace(/^_|_$/g, '');
}

// ==========================================
// ERROR HANDLING
// ==========================================

const DEBUG_ERRORS =
  process.env.DEBUG_ERRORS === '1' ||
  process.env.DEBUG_ERRORS === 'true' ||
  process.env.DEBUG_ERRORS === 'yes';

// zod issue lists for a wide config can run long
const MAX_DETAIL_LENGTH = 300;

function safeStringify(value: unknown): string {
  let text: string;
  try {
    text = JSON.stringify(value, (_key, field: unknown) =>
      typeof field === 'bigint' ? `${field}n` : field
    ) ?? String(value);
  } catch {
    text = String(value);
  }
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}…` : text;
}

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);

    const code = readField(error, 'code');
    if (code !== undefined) parts.push(`code=${String(code)}`);

    // zod collects every failed check under `issues`
    const issues = readField(error, 'issues');
    if (Array.isArray(issues) && issues.length > 0) {
      parts.push(`issues=${safeStringify(issues)}`);
    }

    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.warn(prefix + formatError(error));
  if (DEBUG_ERRORS && error instanceof Error && error.stack) {
    console.warn(error.stack);
  }
}

// ==========================================
// FILE/PATH HELPERS
// ==========================================

/**
 * Slug for output file stems. Accents are folded to ASCII ("Café" -> "cafe")
 * and the result is capped so `<stem>-tol<T>.outline.png` stays short.
 */
export function sanitizeFilePart(value: string, maxLength = 48): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+/, '')
    .slice(0, maxLength)
    .replace(/-+$/, '');
}

// ==========================================
// CONCURRENCY HELPERS
// ==========================================

/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep input order. Workers pull from one shared iterator.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const queue = items.entries();

  async function worker(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await fn(item, index);
    }
  }

  const workerCount = clamp(Math.trunc(concurrency), 1, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

// ==========================================
// SVG HELPERS
// ==========================================

const SVG_ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeSvgAttribute(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => SVG_ATTRIBUTE_ESCAPES[ch] ?? ch);
}
