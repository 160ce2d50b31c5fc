/**
 * Public API of the debug server.
 *
 * TYPES:
 *   - IDebugService   - The service interface contract
 *   - Snapshot        - Interpreter state before one statement
 *   - StepResult      - Result of moving the cursor
 *   - Breakpoint      - Top-level statement breakpoint
 *   - SessionConfig   - Session creation options
 *   - ServerEvent     - WebSocket events (server -> client)
 *   - ClientCommand   - WebSocket commands (client -> server)
 *
 * IMPLEMENTATION:
 *   - DebugSession    - One recorded run
 *   - DebugServer     - The HTTP/WebSocket server
 *   - startDebugServer()
 */

export type {
  IDebugService,
  SessionConfig,
  SessionStatus,
  Snapshot,
  SerializedValue,
  SerializedBinding,
  StepResult,
  LoadResult,
  RunSummary,
  HistoryEntry,
  Breakpoint,
  ServerEvent,
  ClientCommand,
} from "./debugService";

export { DebugSession, DEFAULT_MAX_SNAPSHOTS } from "./debugSession";
export { DebugServer, SessionNotFoundError, type DebugServerOptions } from "./debugServer";
export { serializeValue, summarizeStatement } from "./stateSerializer";

import { DebugServer, type DebugServerOptions } from "./debugServer";

/**
 * Start a debug server.
 *
 * @example
 * ```typescript
 * const server = await startDebugServer({ port: 4317 });
 * // REST at http://127.0.0.1:4317, WebSocket at ws://127.0.0.1:4317/ws?session=<id>
 * ```
 */
export async function startDebugServer(options: DebugServerOptions = {}): Promise<DebugServer> {
  const server = new DebugServer(options);
  await server.start();
  return server;
}

// ============================================================
// API DOCUMENTATION
// ============================================================

/**
 * ## REST Endpoints
 *
 * ### Session Management
 * - POST   /session                    - Create new session (body: { name? })
 * - GET    /sessions                   - List all sessions
 * - GET    /session/:id                - Get session info
 * - DELETE /session/:id                - Close session
 *
 * ### Execution
 * - POST   /session/:id/load           - Record a document (body: the document, or { document })
 * - POST   /session/:id/step           - Next statement
 * - POST   /session/:id/step/:n        - Move N statements
 * - POST   /session/:id/next           - Step over calls
 * - POST   /session/:id/continue       - Run until breakpoint/done
 * - POST   /session/:id/back           - Previous statement
 *
 * ### Inspection
 * - GET    /session/:id/snapshot       - State at the cursor
 * - GET    /session/:id/variable/:name - One variable, locals first
 * - GET    /session/:id/result         - Output, exit code and error of the whole run
 *
 * ### Breakpoints
 * - POST   /session/:id/breakpoint        - Add breakpoint (body: { index })
 * - DELETE /session/:id/breakpoint/:bpId  - Remove breakpoint
 * - GET    /session/:id/breakpoints       - List breakpoints
 *
 * ### Time Travel
 * - POST   /session/:id/goto/:step     - Move the cursor to a recorded step
 * - GET    /session/:id/history        - One line per recorded step
 *
 * ## WebSocket Protocol
 *
 * Connect to: ws://HOST:PORT/ws?session=SESSION_ID
 *
 * ### Server Events (ServerEvent)
 * - { type: 'snapshot', snapshot }
 * - { type: 'breakpointHit', breakpointId, snapshot }
 * - { type: 'done', result }
 * - { type: 'breakpointAdded', id } / { type: 'breakpointRemoved', id }
 * - { type: 'inspectResult', name, value }
 * - { type: 'error', error: { message } }
 *
 * ### Client Commands (ClientCommand)
 * - { type: 'step' } | { type: 'next' } | { type: 'continue' } | { type: 'back' }
 * - { type: 'stepN', n } | { type: 'goto', step }
 * - { type: 'inspect', name }
 * - { type: 'addBreakpoint', index } | { type: 'removeBreakpoint', breakpointId }
 */
