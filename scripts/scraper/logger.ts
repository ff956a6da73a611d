export const now = () => new Date().toISOString();
export const log = (...args: unknown[]) => console.log(`[${now()}]`, ...args);
export const warn = (...args: unknown[]) => console.warn(`[${now()}]`, ...args);
export const error = (...args: unknown[]) => console.error(`[${now()}]`, ...args);
