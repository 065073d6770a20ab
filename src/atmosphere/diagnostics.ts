/**
 * Diagnostic sink for non-fatal notices.
 *
 * Warnings never change a returned value. Callers that want them routed
 * elsewhere (or dropped) pass their own sink in the options object.
 *
 * `debug` receives the intermediate-value dumps requested with a
 * `debug: true` option. A sink without it drops them.
 */

export interface DiagnosticSink {
  warn(message: string): void
  debug?(message: string): void
}

/** Default sink: writes to the console. */
export const CONSOLE_DIAGNOSTICS: DiagnosticSink = {
  warn(message: string) {
    console.warn(message)
  },
  debug(message: string) {
    console.debug(message)
  },
}

/** Discards every message. */
export const SILENT_DIAGNOSTICS: DiagnosticSink = {
  warn() {},
}
