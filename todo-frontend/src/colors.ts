// Color palette for the Todo app
// Light theme is seeded from blue, dark theme from indigo

export const colors = {
  // Brand colors (light theme seed)
  blue: {
    50: '#eff6ff',
    100: '#dbeafe',
    300: '#93c5fd',
    500: '#3b82f6',
    700: '#1d4ed8',
    900: '#1e3a8a'
  },

  // Dark theme seed
  indigo: {
    100: '#e0e7ff',
    300: '#a5b4fc',
    500: '#6366f1',
    700: '#4338ca',
    900: '#312e81'
  },

  neutral: {
    50: '#f9fafb',
    100: '#f3f4f6',
    200: '#e5e7eb',
    400: '#9ca3af',
    600: '#4b5563',
    800: '#1f2937',
    900: '#111827',
    950: '#030712'
  },

  // Priority tints: base is drawn at half opacity behind the card,
  // strong is the badge background
  priority: {
    urgent: {
      base: '#ef4444',
      strong: '#c62828'
    },
    high: {
      base: '#f97316',
      strong: '#ef6c00'
    },
    medium: {
      base: '#eab308',
      strong: '#f9a825'
    },
    low: {
      base: '#22c55e',
      strong: '#2e7d32'
    }
  },

  error: {
    light: '#fef2f2',
    main: '#dc2626',
    dark: '#991b1b'
  }
} as const;

// Appends an alpha channel to a #rrggbb color
export const withOpacity = (hex: string, opacity: number): string => {
  const alpha = Math.round(Math.min(Math.max(opacity, 0), 1) * 255)
    .toString(16)
    .padStart(2, '0');
  return `${hex}${alpha}`;
};
