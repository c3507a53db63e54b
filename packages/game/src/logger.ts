import bunyan from "bunyan";

const logFile = process.env.LOG_FILE;

const log = bunyan.createLogger({
  name: "yesno-othello",
  level: (process.env.LOG_LEVEL as bunyan.LogLevelString) || "warn",
  streams: logFile ? [{ path: logFile }] : [{ stream: process.stderr }],
});

export default log;
