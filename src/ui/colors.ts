import chalk, { type ChalkInstance } from 'chalk';

export interface Theme {
  primary: string;
  success: string;
  warning: string;
  error: string;
  accent: string;
  muted: string;
}

export const DEFAULT_THEME: Theme = {
  primary: 'blue',
  success: 'green',
  warning: 'yellow',
  error: 'red',
  accent: 'cyan',
  muted: 'gray',
};

const getThemeColor = (colorName: string): ChalkInstance => {
  const colorMap: Record<string, ChalkInstance> = {
    blue: chalk.blue,
    green: chalk.green,
    yellow: chalk.yellow,
    red: chalk.red,
    cyan: chalk.cyan,
    magenta: chalk.magenta,
    white: chalk.white,
    gray: chalk.gray,
  };
  return colorMap[colorName] || chalk.white;
};

export class Colors {
  constructor(private readonly theme: Theme = DEFAULT_THEME) {}

  get primary(): ChalkInstance {
    return getThemeColor(this.theme.primary);
  }

  get success(): ChalkInstance {
    return getThemeColor(this.theme.success);
  }

  get warning(): ChalkInstance {
    return getThemeColor(this.theme.warning);
  }

  get error(): ChalkInstance {
    return getThemeColor(this.theme.error);
  }

  get accent(): ChalkInstance {
    return getThemeColor(this.theme.accent);
  }

  get muted(): ChalkInstance {
    return getThemeColor(this.theme.muted);
  }

  get bold(): ChalkInstance {
    return chalk.bold;
  }

  // Gradient text (for the banner)
  gradient(text: string, colors: string[] = ['cyan', 'blue', 'magenta']): string {
    const chars = text.split('');
    const colorFns = colors.map((c) => getThemeColor(c));
    return chars
      .map((char, i) => {
        const colorIndex = Math.floor((i / chars.length) * colorFns.length);
        return colorFns[colorIndex](char);
      })
      .join('');
  }
}

export const colors = new Colors();
