/**
 * Minimal terminal colors for CLI output
 *
 * Honors NO_COLOR / FORCE_COLOR and only colors a TTY stdout.
 */

const hasColors = (() => {
  if ('NO_COLOR' in process.env) return false;
  if ('FORCE_COLOR' in process.env) return true;
  if (process.env.TERM === 'dumb') return false;
  return Boolean(process.stdout?.isTTY);
})();

const code = (open: number, close: number) => {
  if (!hasColors) return (s: string | number) => String(s);

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  // Re-open after nested closes: colors.bold(colors.red('x'))
  return (s: string | number): string => openCode + String(s).replace(closeRe, openCode) + closeCode;
};

export const bold = code(1, 22);
export const red = code(31, 39);
export const green = code(32, 39);
export const yellow = code(33, 39);
export const cyan = code(36, 39);
export const gray = code(90, 39);

const colors = { bold, red, green, yellow, cyan, gray };

export default colors;
