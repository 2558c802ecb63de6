export { runCli, type CliIO } from "./cli.js";
