/**
 * Number and text formatting for console views.
 *
 * Grades and fractional credits use a decimal comma ("2,3"), matching how
 * grades are written on transcripts.
 */

/**
 * Formats a grade with one decimal and a comma; '-' when absent.
 *
 * @example
 * formatGrade(2.3);  // '2,3'
 * formatGrade(null); // '-'
 */
export function formatGrade(grade: number | null): string {
  if (grade === null) {
    return '-';
  }
  return grade.toFixed(1).replace('.', ',');
}

/**
 * One decimal with a comma, dropping a trailing ",0".
 *
 * @example
 * formatDecimal(30);   // '30'
 * formatDecimal(22.5); // '22,5'
 */
export function formatDecimal(value: number): string {
  const text = value.toFixed(1).replace('.', ',');
  return text.endsWith(',0') ? text.slice(0, -2) : text;
}

/**
 * Integer with an explicit sign; zero is '+0'.
 */
export function formatSigned(value: number): string {
  return value >= 0 ? `+${value}` : `${value}`;
}

/**
 * A bracketed bar of `length` cells, filled in proportion to `percent`
 * (clamped to 0..100).
 *
 * @example
 * progressBar(50, 10); // '[█████░░░░░]'
 */
export function progressBar(percent: number, length: number = 20): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * length);
  return `[${'█'.repeat(filled)}${'░'.repeat(length - filled)}]`;
}

/**
 * Cuts `text` to `width` characters and pads it on the right.
 */
export function fit(text: string, width: number): string {
  return text.slice(0, width).padEnd(width);
}

/**
 * Greedy word wrap. Words longer than `width` get a line of their own and
 * are cut to fit.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    let current = '';
    for (const word of paragraph.split(' ')) {
      if (current === '') {
        current = word;
      } else if (current.length + 1 + word.length <= width) {
        current = `${current} ${word}`;
      } else {
        lines.push(current);
        current = word;
      }
    }
    lines.push(current);
  }

  return lines.map((line) => line.slice(0, width));
}
