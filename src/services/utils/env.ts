/**
 * Environment access utilities
 */

/**
 * Read an environment variable, treating empty strings as unset.
 */
export const getEnvVariable = (key: string): string | undefined => {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
};
