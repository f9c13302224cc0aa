let verbose = false;

export function setVerbose(on: boolean): void {
  verbose = on;
}

export const log = {
  debug(msg: string): void {
    if (verbose) console.log(`DEBUG: ${msg}`);
  },
  info(msg: string): void {
    console.log(`INFO: ${msg}`);
  },
  warn(msg: string): void {
    console.warn(`WARNING: ${msg}`);
  },
};
