// src/core/errors.ts

/**
 * Thrown for invalid caller-supplied configuration such as an unknown unit
 * name or a malformed layer map entry. Geometry problems never throw.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
