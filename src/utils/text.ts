/**
 * Capitalize the first letter of every letter run and lowercase the rest,
 * so "o'brien-smith" becomes "O'Brien-Smith".
 */
export function titleCase(value: string): string {
  let result = "";
  let previousWasLetter = false;
  for (const char of value) {
    const isLetter = char.toLowerCase() !== char.toUpperCase();
    if (isLetter) {
      result += previousWasLetter ? char.toLowerCase() : char.toUpperCase();
    } else {
      result += char;
    }
    previousWasLetter = isLetter;
  }
  return result;
}

export const collapseWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();
