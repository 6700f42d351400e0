import pino from "pino";

export const logger = pino({
  name: "window-governor",
  level:
    process.env.NODE_ENV === "test" ? "silent" : process.env.LOG_LEVEL ?? "info",
});
