import { useState, useEffect } from "react";

/**
 * Utility functions for localStorage operations
 */
export class LocalStorageUtils {
  /**
   * Save a value to localStorage with error handling
   */
  static save<T>(key: string, value: T): void {
    try {
      localStorage.setItem(key, JSON.stringify(value));
    } catch (error) {
      console.warn(`Failed to save to localStorage for key "${key}":`, error);
    }
  }

  /**
   * Load and validate a value, falling back to the default when missing or malformed
   */
  static load<T>(
    key: string,
    defaultValue: T,
    validate: (value: unknown) => value is T
  ): T {
    try {
      const item = localStorage.getItem(key);
      if (item === null) {
        return defaultValue;
      }
      const parsed: unknown = JSON.parse(item);
      if (!validate(parsed)) {
        console.warn(`Ignoring invalid stored value for key "${key}"`);
        return defaultValue;
      }
      return parsed;
    } catch (error) {
      console.warn(`Failed to load from localStorage for key "${key}":`, error);
      return defaultValue;
    }
  }
}

/**
 * Custom hook for persisted state using localStorage
 * Loads the initial state from localStorage and saves every change back
 */
export function usePersistedState<T>(
  key: string,
  defaultValue: T,
  validate: (value: unknown) => value is T
): [T, React.Dispatch<React.SetStateAction<T>>] {
  const [state, setState] = useState<T>(() =>
    LocalStorageUtils.load(key, defaultValue, validate)
  );

  useEffect(() => {
    LocalStorageUtils.save(key, state);
  }, [key, state]);

  return [state, setState];
}
