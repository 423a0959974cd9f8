/**
 * Decimal formatting for floating-point numbers
 */

const EXPONENT_FORM = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest decimal text that reads back as the same double, always in plain
 * positional notation: 1e21 → "1000000000000000000000", 1.5e-7 → "0.00000015".
 * Negative zero keeps its sign. Non-finite values have no decimal form and
 * must be rejected by the caller.
 */
export const formatFloat = (value: number): string => {
  if (Object.is(value, -0)) {
    return "-0";
  }

  // String() already yields the shortest round-trip digits; only the
  // exponent form needs expanding.
  const shortest = String(value);
  const match = EXPONENT_FORM.exec(shortest);
  if (!match) {
    return shortest;
  }

  const [, sign = "", intPart = "", fracPart = "", exponentText = "0"] = match;
  const digits = intPart + fracPart;
  const pointAt = intPart.length + Number(exponentText);

  if (pointAt <= 0) {
    return `${sign}0.${"0".repeat(-pointAt)}${digits}`;
  }
  if (pointAt >= digits.length) {
    return `${sign}${digits}${"0".repeat(pointAt - digits.length)}`;
  }
  return `${sign}${digits.slice(0, pointAt)}.${digits.slice(pointAt)}`;
};

