export { runCli, parseHex, type CliIO } from './cli.js';
