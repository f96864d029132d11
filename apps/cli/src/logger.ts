import bunyan from "bunyan";

// JSON lines on stderr so they never interleave with the board on stdout.
// The level is raised or lowered once the config is resolved.
const log = bunyan.createLogger({
  name: "flipside-cli",
  level: "warn",
  stream: process.stderr,
});

export default log;
