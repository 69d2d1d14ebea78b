// ── Project files ────────────────────────────────────────────────────

/** GET /api/files */
export interface FileListResponse {
  files: string[];
}

/** GET /api/files/* */
export interface FileContentResponse {
  path: string;
  content: string;
}

/** PUT /api/files/* */
export interface FileWriteRequest {
  content: string;
}

export interface FileWriteResponse {
  ok: boolean;
  path: string;
}

// ── Trained models ───────────────────────────────────────────────────

export interface ModelInfo {
  name: string;
  sizeMb: number;
  /** ISO timestamp of the archive's modification time */
  createdAt: string;
}

/** GET /api/models */
export interface ModelsResponse {
  models: ModelInfo[];
}

// ── Chat relay ───────────────────────────────────────────────────────

/** POST /api/chat */
export interface ChatRequest {
  message: string;
  sender?: string;
}

/** One reply from the agent runtime's REST channel. */
export interface ChatReply {
  recipient_id?: string;
  text?: string;
  image?: string;
  buttons?: { title: string; payload: string }[];
  custom?: unknown;
}

export interface ChatResponse {
  responses: ChatReply[];
}
