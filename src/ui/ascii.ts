// Symbols for zsh-bootstrap output

export const ASCII = {
  logoMini: `◆ zsh-bootstrap`,

  icons: {
    install: '◆',
    patch: '◈',
    verify: '◉',
    doctor: '◎',
    config: '◇',
  },

  status: {
    success: '✓',
    error: '✗',
    warning: '!',
    info: 'i',
    arrow: '→',
    bullet: '•',
    step: '==>',
    check: '✔',
    cross: '✖',
    skip: '○',
  },
};

// Create a horizontal divider
export const divider = (width: number = 50, char: string = '─'): string => {
  return char.repeat(width);
};
