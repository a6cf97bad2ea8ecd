/**
 * Package version reported by the API and CLI
 */
export const VERSION = "0.1.0";
