/**
 * Renders invocation outcomes for people. The core never formats output
 * itself; front ends pick a formatter.
 */
import {
  HandshakeError,
  RetryExhaustedError,
  ToolClientError,
  messageOf,
} from "../core/errors.js";
import { contentToText, type ToolResult } from "../core/invocation-proxy.js";
import type { ToolDescriptor } from "../core/schema-registry.js";

export interface ResultFormatter<T> {
  formatResult(result: ToolResult): T;
  formatError(err: unknown): T;
}

/** Concise text output. Never exposes stack traces or raw server payloads. */
export class PlainTextFormatter implements ResultFormatter<string> {
  formatResult(result: ToolResult): string {
    const text = contentToText(result.content);
    return text.length > 0 ? text : "(no output)";
  }

  formatError(err: unknown): string {
    if (!(err instanceof ToolClientError)) {
      return "Sorry, something went wrong while calling the tool.";
    }

    switch (err.kind) {
      case "missing_parameter":
      case "invalid_parameter":
      case "tool_not_found":
        return err.message;
      case "tool_execution":
        return `Tool failed: ${err.message}`;
      case "timeout":
        return "The tool server did not answer in time. Please try again.";
      case "connection_lost":
      case "transport_closed":
      case "connection_closed":
        return "Lost contact with the tool server. Please try again.";
      case "retry_exhausted":
        return err instanceof RetryExhaustedError
          ? `Gave up after ${err.attempts} attempts: ${this.formatError(err.cause)}`
          : err.message;
      case "launch":
        return `Could not start the tool server: ${err.message}`;
      case "handshake":
        return err instanceof HandshakeError
          ? `The tool server did not finish starting up (${err.reason}).`
          : err.message;
      case "config":
        return `Configuration problem: ${err.message}`;
      default:
        return `Tool call failed: ${messageOf(err)}`;
    }
  }

  formatToolList(tools: ToolDescriptor[]): string {
    if (tools.length === 0) return "(no tools)";
    return tools
      .map((tool) => {
        const params = Object.entries(tool.parameters)
          .map(([name, spec]) => `${name}${spec.required ? "" : "?"}: ${spec.type}`)
          .join(", ");
        const line = `${tool.name}(${params})`;
        return tool.description ? `${line} - ${tool.description}` : line;
      })
      .join("\n");
  }
}
