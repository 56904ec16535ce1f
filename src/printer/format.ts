// CSI and OSC sequences; the model is asked for "ansi art" and ESC bytes would
// be read as ESC/POS commands
const ANSI_PATTERN = /\x1b(?:\[[0-?]*[ -/]*[@-~]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[@-Z\\-_])/g;
const CONTROL_PATTERN = /[\x00-\x08\x0b-\x1f\x7f]/g;

export const stripUnprintable = (text: string): string =>
  text
    .replace(/\r\n?/g, '\n')
    .replace(ANSI_PATTERN, '')
    .replace(/\t/g, '    ')
    .replace(CONTROL_PATTERN, '');

/**
 * Breaks a line at the last space that fits within `width`, or hard-cuts
 * when a single word is longer than the paper. Widths count code points, so
 * a cut never lands inside a surrogate pair.
 */
export const wrapLine = (line: string, width: number): string[] => {
  const lines: string[] = [];
  let rest = Array.from(line.trimEnd());

  while (rest.length > width) {
    const space = rest.lastIndexOf(' ', width);
    const cut = space > 0 ? space : width;
    lines.push(rest.slice(0, cut).join('').trimEnd());
    rest = Array.from(rest.slice(cut).join('').trimStart());
  }

  lines.push(rest.join(''));
  return lines;
};

export const toPrintableLines = (text: string, width: number): string[] =>
  stripUnprintable(text)
    .trim()
    .split('\n')
    .flatMap((line) => wrapLine(line, width));
