import React, { createContext, useContext } from 'react';
import type { AppTheme } from './theme';

const ThemeContext = createContext<AppTheme | null>(null);

interface ThemeProviderProps {
  theme: AppTheme;
  children: React.ReactNode;
}

export const ThemeProvider: React.FC<ThemeProviderProps> = ({ theme, children }) => (
  <ThemeContext.Provider value={theme}>{children}</ThemeContext.Provider>
);

export const useAppTheme = (): AppTheme => {
  const theme = useContext(ThemeContext);
  if (!theme) {
    throw new Error('useAppTheme must be used inside a ThemeProvider');
  }
  return theme;
};
