/**
 * Round to specified decimal places
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Number of decimal places a step carries ("0.001" -> 3, 1e-7 -> 7, 5 -> 0)
 */
export function stepDecimals(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return 0;

  const text = step.toString();
  const exponent = text.match(/e-(\d+)$/);
  if (exponent?.[1]) {
    const mantissa = text.split('e')[0] ?? '';
    const mantissaDecimals = mantissa.includes('.') ? (mantissa.split('.')[1]?.length ?? 0) : 0;
    return Number(exponent[1]) + mantissaDecimals;
  }

  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/**
 * Round a quantity to an exchange quantity step.
 * "nearest" cleans float noise off a size the exchange reported,
 * "down" never exceeds the input (used after a precision rejection).
 */
export function roundToStep(value: number, step: number, direction: 'nearest' | 'down' = 'nearest'): number {
  if (!Number.isFinite(step) || step <= 0) return value;

  const steps = value / step;
  // Tolerance absorbs representations like 2.9999999999999996 steps
  const count = direction === 'down' ? Math.floor(steps + 1e-9) : Math.round(steps);
  const decimals = stepDecimals(step);
  return Number((count * step).toFixed(decimals));
}

/**
 * Format a quantity at the step's precision for the wire ("0.010")
 */
export function formatQuantity(value: number, step: number): string {
  return value.toFixed(stepDecimals(step));
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Parse a numeric string from an exchange payload; NaN for empty or garbage
 */
export function toNumber(value: unknown): number {
  if (value === null || value === undefined || value === '') return NaN;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : NaN;
}

/**
 * Format a ratio as a percentage string (0.625 -> "62.5%")
 */
export function formatPercent(ratio: number, decimals: number = 1): string {
  return `${(ratio * 100).toFixed(decimals)}%`;
}
