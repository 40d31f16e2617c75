import Ajv, { type SchemaObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { TARGET_ITEM_TYPES } from "../models/target";

/** Envelope of a builder hero export: only the structure the converter walks is pinned. */
const sourceDocumentSchema: SchemaObject = {
  $id: "SourceDocument",
  type: "object",
  required: ["name", "class"],
  properties: {
    name: { type: "string", minLength: 1 },
    ancestry: { type: "object", nullable: true },
    culture: { type: "object", nullable: true },
    career: { type: "object", nullable: true },
    class: {
      type: "object",
      required: ["name", "featuresByLevel"],
      properties: {
        name: { type: "string", minLength: 1 },
        featuresByLevel: {
          type: "array",
          items: {
            type: "object",
            required: ["level"],
            properties: {
              level: { type: "number", minimum: 1 },
              features: { type: "array", items: { type: "object" } },
            },
          },
        },
        abilities: { type: "array", items: { type: "object" } },
        subclasses: { type: "array", items: { type: "object" } },
      },
    },
    features: { type: "array", items: { type: "object" } },
    state: { type: "object", nullable: true },
  },
  additionalProperties: true,
};

const catalogEntrySchema: SchemaObject = {
  $id: "CatalogEntry",
  type: "object",
  required: ["name", "type"],
  properties: {
    _id: { type: "string" },
    name: { type: "string", minLength: 1 },
    type: { type: "string", minLength: 1 },
    img: { type: "string" },
    system: {
      type: "object",
      properties: {
        _dsid: { type: "string" },
        advancements: { type: "object" },
      },
    },
  },
  additionalProperties: true,
};

const targetItemSchema: SchemaObject = {
  $id: "TargetItem",
  type: "object",
  required: ["name", "type", "img", "system"],
  properties: {
    name: { type: "string", minLength: 1 },
    type: { type: "string", enum: [...TARGET_ITEM_TYPES] },
    img: { type: "string", format: "uri-reference" },
    system: {
      type: "object",
      required: ["description"],
      properties: {
        description: {
          type: "object",
          required: ["value"],
          properties: {
            value: { type: "string", minLength: 1 },
          },
        },
      },
    },
  },
  additionalProperties: true,
};

export const schemas = {
  sourceDocument: sourceDocumentSchema,
  catalogEntry: catalogEntrySchema,
  targetItem: targetItemSchema,
} as const;

export type SchemaMap = typeof schemas;

const ajv = new Ajv({
  strict: true,
  allErrors: true,
});
addFormats(ajv);

export const validators: { [K in keyof SchemaMap]: ValidateFunction } = {
  sourceDocument: ajv.compile(sourceDocumentSchema),
  catalogEntry: ajv.compile(catalogEntrySchema),
  targetItem: ajv.compile(targetItemSchema),
};

export type ValidatorMap = typeof validators;
export type ValidatorKey = keyof ValidatorMap;
