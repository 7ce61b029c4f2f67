/** The slice of `console` the server writes to; tests pass spies instead. */
export type Logger = Pick<Console, "info" | "warn" | "error">;

export const consoleLogger: Logger = console;
