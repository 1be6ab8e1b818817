/**
 * Port for the command's user-facing output (the result line and --help).
 *
 * Diagnostics never go through here; they go to the Nest logger on stderr.
 */
export interface OutputPort {
  write(text: string): void;
}

export const OUTPUT_PORT = Symbol('OUTPUT_PORT');
