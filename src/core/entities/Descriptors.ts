/**
 * Static capability descriptors advertised to MCP clients
 */
// JSON Schema object for a tool's arguments
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
  [key: string]: unknown;
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export type PromptArgumentDescriptor = {
  name: string;
  description: string;
  required: boolean;
};

export type PromptDescriptor = {
  name: string;
  description: string;
  arguments: PromptArgumentDescriptor[];
};

export type ResourceDescriptor = {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
};
