import pino from "pino";

// Create a lazy logger factory that only initializes when first used
let loggerInstance: pino.Logger | null = null;

function createLogger(): pino.Logger {
  const level = process.env["LOG_LEVEL"] ?? "silent";
  if (level === "silent") {
    // Diagnostics are opt-in so they never interleave with formatted output
    return pino({ level: "silent", enabled: false });
  }

  const options: pino.LoggerOptions = {
    name: "termtext",
    level,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const debugLog = process.env["TERMTEXT_DEBUG_LOG"];
  if (debugLog && debugLog.length > 0) {
    return pino(
      options,
      pino.destination({ dest: debugLog, mkdir: true, sync: true }),
    );
  }
  return pino(options, pino.destination({ dest: 2, sync: true }));
}

function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

export const logger = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    return getLogger()[prop as keyof pino.Logger];
  },
});
