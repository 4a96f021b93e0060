/**
 * Fixed-point helpers. Amounts travel through the code as integers:
 * USD in ten-thousandths ("minor units"), NGN in kobo, multipliers in
 * hundredths. Storage keeps them as numeric strings.
 */

export const USD_SCALE = 4;
export const NGN_SCALE = 2;
export const MULTIPLIER_SCALE = 2;

export const USD_TO_NGN = 1000;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d*))?$/;

/** Parses a decimal string or number, truncating digits beyond `scale`. */
export function parseDecimal(value: string | number, scale: number): number {
  let text = typeof value === "number" ? numberToPlainString(value) : value.trim();
  if (text.startsWith("+")) text = text.slice(1);

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new Error(`Invalid decimal value: ${String(value)}`);
  }

  const [, sign, whole, fraction = ""] = match;
  const digits = fraction.slice(0, scale).padEnd(scale, "0");
  const magnitude = Number(whole) * 10 ** scale + Number(digits || "0");
  if (!Number.isSafeInteger(magnitude)) {
    throw new Error(`Decimal value out of range: ${String(value)}`);
  }
  return sign && magnitude !== 0 ? -magnitude : magnitude;
}

function numberToPlainString(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid decimal value: ${value}`);
  }
  const text = String(value);
  return /e/i.test(text) ? value.toFixed(12) : text;
}

export function formatDecimal(units: number, scale: number, digits = scale): string {
  const negative = units < 0;
  const abs = Math.abs(units);
  const factor = 10 ** scale;
  const whole = Math.floor(abs / factor);
  let fraction = String(abs % factor).padStart(scale, "0").slice(0, digits);
  if (digits === 0) fraction = "";
  const body = fraction ? `${whole}.${fraction}` : String(whole);
  return negative && /[1-9]/.test(body) ? `-${body}` : body;
}

export function parseUsd(value: string | number): number {
  return parseDecimal(value, USD_SCALE);
}

export function formatUsd(minor: number): string {
  return formatDecimal(minor, USD_SCALE);
}

export function parseNgn(value: string | number): number {
  return parseDecimal(value, NGN_SCALE);
}

export function formatNgn(kobo: number): string {
  return formatDecimal(kobo, NGN_SCALE);
}

/** USD minor units (1e-4 $) to kobo (1e-2 ₦) at the fixed exchange rate. */
export function usdToKobo(minor: number): number {
  return (minor * USD_TO_NGN) / 10 ** (USD_SCALE - NGN_SCALE);
}

/** Kobo to USD minor units, truncated toward zero. */
export function koboToUsd(kobo: number): number {
  return Math.trunc((kobo * 10 ** (USD_SCALE - NGN_SCALE)) / USD_TO_NGN);
}

export function parseMultiplier(value: string | number): number {
  return parseDecimal(value, MULTIPLIER_SCALE);
}

export function formatMultiplier(hundredths: number): string {
  return formatDecimal(hundredths, MULTIPLIER_SCALE);
}

/** amount × multiplier, rounded down to a whole minor unit. */
export function applyMultiplier(minor: number, hundredths: number): number {
  return Math.floor((minor * hundredths) / 10 ** MULTIPLIER_SCALE);
}
