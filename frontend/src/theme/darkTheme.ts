import { theme, type ThemeConfig } from 'antd';

/** Dark theme */
export const darkThemeConfig: ThemeConfig = {
  algorithm: theme.darkAlgorithm,
  token: {
    // brand
    colorPrimary: '#3b82f6',
    colorSuccess: '#22c55e',
    colorWarning: '#f59e0b',
    colorError: '#ef4444',

    // backgrounds
    colorBgContainer: '#1e293b',
    colorBgLayout: '#0f172a',
    colorBgElevated: '#334155',

    // text
    colorText: '#e2e8f0',
    colorTextSecondary: '#94a3b8',
    colorTextTertiary: '#64748b',

    // borders
    colorBorder: '#334155',
    colorBorderSecondary: '#475569',

    // radii
    borderRadius: 8,
    borderRadiusLG: 12,

    // font
    fontFamily:
      '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif',
  },
  components: {
    Card: {
      colorBgContainer: '#1e293b',
      headerBg: 'transparent',
    },
    Button: {
      borderRadius: 8,
      primaryShadow: '0 2px 0 rgba(0, 0, 0, 0.045)',
    },
    Input: {
      colorBgContainer: '#0f172a',
      activeBg: '#0f172a',
      hoverBg: '#0f172a',
    },
    InputNumber: {
      colorBgContainer: '#0f172a',
      activeBg: '#0f172a',
      hoverBg: '#0f172a',
    },
    Select: {
      colorBgContainer: '#0f172a',
    },
    Slider: {
      railBg: '#334155',
      railHoverBg: '#475569',
    },
    Upload: {
      colorBgContainer: '#0f172a',
    },
    Alert: {
      withDescriptionPadding: '12px 16px',
    },
  },
};
