/** Shallow property schemas modules register their settings against. */
export const PROPERTY_TYPES = ["string", "integer", "number", "boolean", "array", "object"] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

export type PropertySchema = {
  type: PropertyType;
  required?: boolean;
  default?: unknown;
  description?: string;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  enum?: unknown[];
  pattern?: string;
  items?: { type: PropertyType };
};

export type ModuleSchema = {
  description?: string;
  properties: Record<string, PropertySchema>;
  /** Defaults to true: unknown keys pass. */
  additionalProperties?: boolean;
};

export type SettingsValidation = {
  valid: boolean;
  errors: string[];
};
