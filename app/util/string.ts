/**
 * Returns true if a string is an integer.
 * @param value - the value to check
 * @returns true if it is an integer and false otherwise
 */
export function isInteger(value: string): boolean {
  return /^-?\d+$/.test(value);
}

/**
 * Returns true if a string is a decimal number with a fractional part.
 * @param value - the value to check
 * @returns true if it is a float and false otherwise
 */
export function isFloat(value: string): boolean {
  return /^-?\d*\.\d+$/.test(value);
}

/**
 * Returns true if a string is `true` or `false`, ignoring case.
 * @param value - the value to check
 */
export function isBoolean(value: string): boolean {
  return /^(true|false)$/i.test(value);
}

/**
 * Parses a boolean string. Anything other than a case-insensitive `true` is false.
 *
 * @param valueStr - the unparsed boolean
 * @returns the parsed result
 */
export function parseBoolean(valueStr: string): boolean {
  return !!valueStr && valueStr.toLowerCase() === 'true';
}
