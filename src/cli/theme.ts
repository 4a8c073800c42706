import chalk from 'chalk';

export type Palette = {
  title: (s: string) => string;
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  redCard: (s: string) => string;
  blackCard: (s: string) => string;
};

export function getPalette(noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color')): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (process.env.CLI_THEME || 'felt').toLowerCase();
  if (theme === 'mono') {
    return {
      title: c.bold,
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      redCard: c.white,
      blackCard: c.white,
    };
  }
  // felt (default): green table, red/white cards
  return {
    title: c.bold.green,
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    redCard: c.redBright,
    blackCard: c.whiteBright,
  };
}
