// Console logging helpers; debug and info output only appears in development

const isDevelopment = () => process.env.NODE_ENV === 'development';

export const debug = (...args: unknown[]) => {
  if (isDevelopment()) {
    console.log(...args);
  }
};

export const logInfo = (...args: unknown[]) => {
  if (isDevelopment()) {
    console.info(...args);
  }
};

/**
 * Always printed, whatever the environment.
 */
export const logWarning = (...args: unknown[]) => {
  console.warn(...args);
};

export const logError = (...args: unknown[]) => {
  console.error(...args);
};
