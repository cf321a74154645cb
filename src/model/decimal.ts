// Decimal normalization for canonical numbers.
// Purpose: reduce any numeric lexeme to one canonical text so 1, 1.0 and 1e0 compare equal.
// Assumes inputs are JSON/YAML/TOML number lexemes or JS number/bigint values.

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

const PLAIN_MAX_EXPONENT = 21;
const PLAIN_MIN_EXPONENT = -7;

export function normalizeDecimal(raw: string): string | null {
  const text = raw.trim().replace(/_/g, "");
  const special = normalizeSpecial(text);
  if (special) return special;

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;

  const [, sign = "", intPart = "", fracPart = "", exponentText = "0"] = match;
  if (intPart.length === 0 && fracPart.length === 0) return null;

  let digits = `${intPart}${fracPart}`.replace(/^0+/, "");
  if (digits.length === 0) return "0";

  let exponent = Number.parseInt(exponentText, 10) - fracPart.length;
  while (digits.endsWith("0")) {
    digits = digits.slice(0, -1);
    exponent += 1;
  }

  const body = renderDigits(digits, exponent);
  return sign === "-" ? `-${body}` : body;
}

export function decimalFromNumber(value: number | bigint): string {
  if (typeof value === "bigint") {
    return value.toString();
  }
  return normalizeDecimal(String(value)) ?? String(value);
}

function normalizeSpecial(text: string): string | null {
  switch (text.toLowerCase()) {
    case "nan":
    case "+nan":
    case "-nan":
      return "NaN";
    case "infinity":
    case "+infinity":
    case "inf":
    case "+inf":
      return "Infinity";
    case "-infinity":
    case "-inf":
      return "-Infinity";
    default:
      return null;
  }
}

// digits carries no leading or trailing zeros; value = digits * 10^exponent
function renderDigits(digits: string, exponent: number): string {
  const magnitude = digits.length + exponent;

  if (exponent >= 0 && magnitude <= PLAIN_MAX_EXPONENT) {
    return `${digits}${"0".repeat(exponent)}`;
  }

  if (exponent < 0 && magnitude > 0) {
    return `${digits.slice(0, magnitude)}.${digits.slice(magnitude)}`;
  }

  if (exponent < 0 && magnitude > PLAIN_MIN_EXPONENT) {
    return `0.${"0".repeat(-magnitude)}${digits}`;
  }

  const mantissa = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
  const scientific = magnitude - 1;
  return `${mantissa}e${scientific >= 0 ? "+" : ""}${scientific}`;
}
