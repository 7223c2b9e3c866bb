export type DebugLog = (message: string) => void;

export type Severity = 'LOW' | 'MEDIUM' | 'HIGH';

export interface DiagnosticEvent {
  component: string;
  event: string;
  error?: string;
  severity: Severity;
  [key: string]: unknown;
}

/**
 * Debug logger gated on the debug flag. stdout carries the MCP transport, so diagnostics go to stderr.
 */
export function createDebugLog(enabled: boolean, scope?: string): DebugLog {
  const prefix = scope ? `[DEBUG] [${scope}]` : '[DEBUG]';
  return (message: string) => {
    if (enabled) {
      console.error(`${prefix} ${message}`);
    }
  };
}

/**
 * One-line structured record for degradations and failures
 */
export function logEvent(event: DiagnosticEvent): void {
  console.error(JSON.stringify({ timestamp: new Date().toISOString(), ...event }));
}
