const wrap = (open: string) => (s: string) => `\x1b[${open}m${s}\x1b[0m`;

export const c = {
  red: wrap("0;31"),
  green: wrap("0;32"),
  yellow: wrap("1;33"),
  blue: wrap("0;34"),
  dim: wrap("2"),
  bold: wrap("1"),
};
