import React from 'react';
import { colors } from './colors';

interface ErrorAppProps {
  message?: string;
}

// Shown instead of the app when startup fails
const ErrorApp: React.FC<ErrorAppProps> = ({ message }) => {
  return (
    <div role="alert" style={{
      display: 'flex',
      flexDirection: 'column',
      justifyContent: 'center',
      alignItems: 'center',
      height: '100vh',
      padding: '2rem',
      boxSizing: 'border-box',
      textAlign: 'center',
      fontFamily: '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif'
    }}>
      <p style={{ color: colors.error.dark, fontSize: 16, margin: 0 }}>
        An error occurred during initialization. Please check the logs and restart the app.
      </p>
      {message && (
        <p style={{ color: colors.neutral[600], fontSize: 14, marginTop: '1rem' }}>
          {message}
        </p>
      )}
    </div>
  );
};

export default ErrorApp;
