// Shared response schemas

const ErrorResponse = {
  type: "object",
  properties: {
    error: { type: "string" },
    message: { type: "string" },
    code: { type: "string" },
    retryable: { type: "boolean" },
  },
} as const;

// Context maps are opaque, so the state is passed through as-is.
const BulkStateResponse = {
  type: "object",
  additionalProperties: true,
  properties: {
    operationId: { type: "string" },
    domain: { type: "string" },
    action: { type: "string" },
    status: { type: "string", enum: ["active", "completed", "cancelled"] },
    totalItems: { type: "number" },
    batchSize: { type: "number" },
    processedCount: { type: "number" },
  },
} as const;

const BulkReplyResponse = {
  type: "object",
  properties: {
    reply: { type: "string" },
    state: BulkStateResponse,
  },
} as const;

const actorParams = {
  type: "object",
  properties: {
    actorId: { type: "string", minLength: 1, maxLength: 200 },
  },
  required: ["actorId"],
} as const;

const security = [{ bearerAuth: [] }];

export const healthSchema = {
  tags: ["System"],
  summary: "Health check",
  description: "Returns OK if the server is running",
  response: {
    200: {
      description: "Server is healthy",
      type: "object",
      properties: {
        status: { type: "string", enum: ["ok"] },
      },
    },
  },
};

export const domainsSchema = {
  tags: ["Bulk"],
  summary: "List bulk domains",
  description: "Returns the domain tags that have a registered adapter.",
  security,
  response: {
    200: {
      type: "object",
      properties: {
        domains: { type: "array", items: { type: "string" } },
      },
    },
    401: { description: "Unauthorized", ...ErrorResponse },
  },
};

export const startSchema = {
  tags: ["Bulk"],
  summary: "Start a bulk operation",
  description:
    "Prepares the operation, counts the matching items and stores a new active session for the actor. No item is processed until the actor confirms.",
  security,
  params: actorParams,
  body: {
    type: "object",
    properties: {
      domain: { type: "string", minLength: 1 },
      params: { type: "object", additionalProperties: true },
      batchSize: { type: "integer" },
    },
    required: ["domain", "params"],
  },
  response: {
    201: { description: "Operation started", ...BulkReplyResponse },
    400: { description: "Invalid parameters or nothing to process", ...ErrorResponse },
    401: { description: "Unauthorized", ...ErrorResponse },
    404: { description: "Unknown domain", ...ErrorResponse },
    409: { description: "A bulk operation is already in progress", ...ErrorResponse },
    422: { description: "Too many items", ...ErrorResponse },
    503: { description: "Service unavailable, retry later", ...ErrorResponse },
  },
};

export const statusSchema = {
  tags: ["Bulk"],
  summary: "Get the actor's bulk operation",
  description: "Returns the status of the actor's active bulk operation.",
  security,
  params: actorParams,
  response: {
    200: { description: "Active operation", ...BulkReplyResponse },
    401: { description: "Unauthorized", ...ErrorResponse },
    404: { description: "No active operation", ...ErrorResponse },
  },
};

export const cancelSchema = {
  tags: ["Bulk"],
  summary: "Cancel the actor's bulk operation",
  description: "Stops the operation. Items already processed are left as they are.",
  security,
  params: actorParams,
  response: {
    200: { description: "Operation cancelled", ...BulkReplyResponse },
    401: { description: "Unauthorized", ...ErrorResponse },
    409: { description: "No active operation, or a request still running", ...ErrorResponse },
  },
};

export const turnSchema = {
  tags: ["Conversation"],
  summary: "Submit a conversational turn",
  description:
    "Routes one utterance through the bulk gate. When the actor has an active operation, 'continue' runs one batch, 'cancel' stops it and anything else returns a reminder. Otherwise the turn is reported as not handled.",
  security,
  params: actorParams,
  body: {
    type: "object",
    properties: {
      message: { type: "string", maxLength: 4000 },
    },
    required: ["message"],
  },
  response: {
    200: {
      description: "Gate outcome",
      type: "object",
      properties: {
        handled: { type: "boolean" },
        intent: { type: "string", enum: ["continue", "cancel", "unrelated"] },
        reply: { type: "string" },
        retryable: { type: "boolean" },
        state: BulkStateResponse,
      },
    },
    401: { description: "Unauthorized", ...ErrorResponse },
    409: { description: "Another request for this actor is still running", ...ErrorResponse },
  },
};
