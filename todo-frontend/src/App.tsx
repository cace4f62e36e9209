import React from 'react';
import type { AppConfig } from './config';
import { sampleTodos } from './sampleTodos';
import type { AppTheme } from './theme';
import { ThemeProvider } from './ThemeContext';
import TodoScreen from './TodoScreen';

interface AppProps {
  theme: AppTheme;
  config: Pick<AppConfig, 'seedTodos'>;
}

const App: React.FC<AppProps> = ({ theme, config }) => {
  return (
    <div className="App" style={{
      fontFamily: '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif'
    }}>
      <ThemeProvider theme={theme}>
        <TodoScreen initialTodos={config.seedTodos ? sampleTodos : []} />
      </ThemeProvider>
    </div>
  );
};

export default App;
