export * from './colors.js';
export * from './ascii.js';
export { renderMainHelp } from './help.js';

// Default export
import UI from './renderer.js';
export { UI };
export default UI;
