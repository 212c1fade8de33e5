import boxen from 'boxen';
import ora, { type Ora } from 'ora';
import { colors } from './colors.js';
import { ASCII, divider } from './ascii.js';

// Terminal width helper
const getTerminalWidth = (): number => {
  return process.stdout.columns || 80;
};

/**
 * Render the banner
 */
export const renderHeader = (subtitle?: string): string => {
  return colors.gradient(ASCII.logoMini) + (subtitle ? colors.muted(` · ${subtitle}`) : '');
};

/**
 * Render a section header
 */
export const renderSection = (title: string, icon?: string): string => {
  const iconStr = icon ? `${icon} ` : '';
  return `\n${colors.primary.bold(`${iconStr}${title}`)}\n${colors.muted(divider(40))}`;
};

/**
 * Render the start of a setup step
 */
export const renderStep = (message: string): string => {
  return `\n${colors.primary.bold(ASCII.status.step)} ${colors.bold(message)}`;
};

export const renderSuccess = (message: string): string => {
  return colors.success(`${ASCII.status.success} ${message}`);
};

export const renderError = (message: string, detail?: string): string => {
  const main = colors.error(`${ASCII.status.error} ${message}`);
  const detailStr = detail ? `\n  ${colors.muted(detail)}` : '';
  return main + detailStr;
};

export const renderWarning = (message: string): string => {
  return colors.warning(`${ASCII.status.warning} ${message}`);
};

export const renderInfo = (message: string): string => {
  return colors.muted(`${ASCII.status.info} ${message}`);
};

/**
 * Render a boxed content area
 */
export const renderBox = (content: string, title?: string): string => {
  const width = Math.min(getTerminalWidth() - 4, 70);

  return boxen(content, {
    padding: 1,
    margin: { top: 1, bottom: 1, left: 0, right: 0 },
    borderStyle: 'round',
    borderColor: 'blue',
    title: title,
    titleAlignment: 'left',
    width,
  });
};

export const renderKeyValue = (key: string, value: string, keyWidth: number = 15): string => {
  const paddedKey = key.padEnd(keyWidth);
  return `${colors.muted(paddedKey)} ${value}`;
};

export const renderList = (
  items: string[],
  options: { bullet?: string; indent?: number } = {}
): string => {
  const { bullet = ASCII.status.bullet, indent = 2 } = options;
  const indentStr = ' '.repeat(indent);
  return items.map((item) => `${indentStr}${colors.accent(bullet)} ${item}`).join('\n');
};

/**
 * Create a spinner with custom styling
 */
export const createSpinner = (text: string): Ora => {
  return ora({
    text,
    spinner: 'dots',
    color: 'cyan',
  });
};

export const UI = {
  // Rendering
  header: renderHeader,
  section: renderSection,
  step: renderStep,
  box: renderBox,
  success: renderSuccess,
  error: renderError,
  warning: renderWarning,
  info: renderInfo,
  keyValue: renderKeyValue,
  list: renderList,

  // Utilities
  spinner: createSpinner,

  // Re-exports
  colors,
  ASCII,
};

export default UI;
