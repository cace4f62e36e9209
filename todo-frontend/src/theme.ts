/**
 * Theme configuration for the app.
 *
 * `createAppTheme` builds one frozen theme object at startup; it is handed
 * to components through `ThemeProvider` instead of being read from a global.
 * The light/dark choice is made each time a color scheme is read, following
 * the system `prefers-color-scheme` setting unless another source is given.
 */
import { colors } from './colors';

export type Brightness = 'light' | 'dark';

export interface ColorScheme {
  primary: string;
  onPrimary: string;
  surface: string;
  onSurface: string;
  background: string;
  onBackground: string;
  outline: string;
  error: string;
  onError: string;
}

export interface TextStyle {
  fontSize: number;
  fontWeight: number;
}

export interface TextStyles {
  headlineMedium: TextStyle;
  headlineSmall: TextStyle;
  titleLarge: TextStyle;
  titleMedium: TextStyle;
  bodyLarge: TextStyle;
  bodyMedium: TextStyle;
  bodySmall: TextStyle;
  labelLarge: TextStyle;
}

export interface ContainerStyle {
  padding: string;
  borderRadius: string;
}

export interface AppTheme {
  readonly light: ColorScheme;
  readonly dark: ColorScheme;
  readonly textStyles: TextStyles;
  readonly container: ContainerStyle;
  readonly brightness: () => Brightness;
}

const lightScheme: ColorScheme = {
  primary: colors.blue[700],
  onPrimary: '#ffffff',
  surface: colors.blue[50],
  onSurface: colors.neutral[900],
  background: '#ffffff',
  onBackground: colors.neutral[900],
  outline: colors.neutral[400],
  error: colors.error.main,
  onError: '#ffffff'
};

const darkScheme: ColorScheme = {
  primary: colors.indigo[300],
  onPrimary: colors.indigo[900],
  surface: colors.neutral[800],
  onSurface: colors.neutral[100],
  background: colors.neutral[950],
  onBackground: colors.neutral[100],
  outline: colors.neutral[600],
  error: '#f87171',
  onError: colors.error.dark
};

const textStyles: TextStyles = {
  headlineMedium: { fontSize: 34, fontWeight: 400 },
  headlineSmall: { fontSize: 24, fontWeight: 400 },
  titleLarge: { fontSize: 20, fontWeight: 500 },
  titleMedium: { fontSize: 16, fontWeight: 400 },
  bodyLarge: { fontSize: 16, fontWeight: 400 },
  bodyMedium: { fontSize: 14, fontWeight: 400 },
  bodySmall: { fontSize: 12, fontWeight: 400 },
  labelLarge: { fontSize: 14, fontWeight: 500 }
};

const containerStyle: ContainerStyle = {
  padding: '16px',
  borderRadius: '8px'
};

export const systemBrightness = (): Brightness => {
  if (typeof window === 'undefined' || typeof window.matchMedia !== 'function') {
    return 'light';
  }
  return window.matchMedia('(prefers-color-scheme: dark)').matches ? 'dark' : 'light';
};

export function createAppTheme(brightness: () => Brightness = systemBrightness): AppTheme {
  return Object.freeze({
    light: Object.freeze({ ...lightScheme }),
    dark: Object.freeze({ ...darkScheme }),
    textStyles: Object.freeze({ ...textStyles }),
    container: Object.freeze({ ...containerStyle }),
    brightness
  });
}

export const currentColorScheme = (theme: AppTheme): ColorScheme =>
  theme.brightness() === 'dark' ? theme.dark : theme.light;

export const currentTextStyles = (theme: AppTheme): TextStyles => theme.textStyles;
