export { darkThemeConfig } from './darkTheme';
