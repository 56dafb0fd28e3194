/**
 * Anything records can be printed to. `process.stdout` and any `Writable`
 * opened in string mode satisfy it.
 */
export interface TextSink {
  write(chunk: string): unknown
}
