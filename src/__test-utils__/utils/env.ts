/**
 * Environment helpers for tests.
 *
 * Centralizes env mutation + restoration to prevent state leaks.
 */

type EnvSnapshot = Record<string, string | undefined>;

const applyEnv = (values: EnvSnapshot): void => {
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) {
      // Assigning `undefined` would store the string "undefined"
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
};

/**
 * Temporarily apply environment changes for the duration of a callback.
 */
export const withEnv = async <T>(
  updates: EnvSnapshot,
  fn: () => Promise<T> | T,
): Promise<T> => {
  const snapshot: EnvSnapshot = {};
  for (const key of Object.keys(updates)) {
    snapshot[key] = process.env[key];
  }

  applyEnv(updates);
  try {
    return await fn();
  } finally {
    applyEnv(snapshot);
  }
};
