import React from 'react';
import { currentColorScheme } from './theme';
import { useAppTheme } from './ThemeContext';

interface ThemedContainerProps {
  children: React.ReactNode;
  style?: React.CSSProperties;
}

// Surface-colored box with the theme's padding and radius; `style` overrides
const ThemedContainer: React.FC<ThemedContainerProps> = ({ children, style }) => {
  const theme = useAppTheme();
  const scheme = currentColorScheme(theme);

  return (
    <div style={{
      padding: theme.container.padding,
      borderRadius: theme.container.borderRadius,
      backgroundColor: scheme.surface,
      ...style
    }}>
      {children}
    </div>
  );
};

export default ThemedContainer;
