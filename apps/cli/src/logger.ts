import bunyan from "bunyan";

/** Game output goes to stdout; logs stay on stderr. */
const log = bunyan.createLogger({
  name: "flipside-cli",
  level: "warn",
  stream: process.stderr,
});

export default log;
