import React from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { runBootstrap, type RootScreen } from './bootstrap';
import { loadConfig } from './config';
import ErrorApp from './ErrorApp';
import { firebaseBackend } from './firebase';
import { rootLogger } from './logger';
import { DomSplashScreen } from './splash';
import { createAppTheme } from './theme';
import './index.css';

const logger = rootLogger.getLogger('main');

const container = document.getElementById('root');
if (!container) {
  throw new Error('Root element #root not found');
}

const root = createRoot(container);
const theme = createAppTheme();

const mount = (screen: RootScreen) => {
  root.render(
    screen.kind === 'app'
      ? <App theme={theme} config={screen.config} />
      : <ErrorApp message={screen.message} />
  );
};

runBootstrap({
  splash: new DomSplashScreen(document),
  backend: firebaseBackend,
  loadConfig: () => loadConfig(),
  mount,
  logger: rootLogger.getLogger('bootstrap')
}).catch((error: unknown) => {
  logger.error('Error in main:', error);
});
