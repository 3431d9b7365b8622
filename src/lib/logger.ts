export type Logger = Pick<Console, "log" | "warn" | "error">;

export const consoleLogger: Logger = console;

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
