let verbose = process.env.TUNESMITH_DEBUG === "1";

export function setVerbose(value: boolean): void {
  verbose = value;
}

/**
 * Progress output goes to stderr so stdout stays pipeable (json/ids formats).
 */
export function log(message: string): void {
  console.error(message);
}

export function debug(message: string): void {
  if (verbose) console.error(message);
}
