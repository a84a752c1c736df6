/**
 * Package version, reported by `docpp --version`
 */
export const VERSION = "0.1.0";
