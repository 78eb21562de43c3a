export interface ModelRequest {
  system?: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
  /** Sent to the local model; the hosted model takes temperature alone */
  topP: number;
  /** Ask the backend for JSON-constrained output where it supports it */
  json?: boolean;
}

/**
 * Text-in/text-out contract shared by the hosted and local models.
 * Implementations resolve to null on any failure instead of throwing.
 */
export interface ModelGateway {
  readonly name: string;
  complete(request: ModelRequest): Promise<string | null>;
}

