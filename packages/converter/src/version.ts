export const VERSION = "0.1.0";
export const BUILD_DATE = "2026-10-19";
