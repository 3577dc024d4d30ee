import { z } from "zod";

// Shapes of the rule the agent submits. `ruleStructureSchema` is what the
// agent hands in (loose, so structural problems can be reported all at once);
// `ruleDocumentSchema` is the document posted to the backend.
//
// Document layout: apiVersion + kind + meta (name, purpose, description,
// labels, annotations) + spec (inputs, inputsMeta__, outputsMeta__, tasks, ioMap).

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const looseMeta = z.object({
  name: z.string().optional(),
  dataType: z.string().optional(),
  required: z.boolean().optional(),
  defaultValue: scalar.optional(),
});

export const ruleStructureSchema = z.object({
  rule_name: z.string().describe("Rule name"),
  purpose: z.string().optional(),
  description: z.string().optional(),
  app_type: z.string().optional().describe("Primary application type; derived from the tasks when omitted"),
  environment: z.string().optional(),
  exec_level: z.string().optional(),
  inputs: z.record(scalar).optional().describe("Rule inputs keyed by bare input name"),
  inputs_meta: z.array(looseMeta).optional(),
  outputs_meta: z.array(looseMeta).optional(),
  tasks: z.array(
    z.object({
      name: z.string(),
      purpose: z.string().optional(),
      app_type: z.array(z.string()).optional(),
    })
  ),
  io_map: z.array(z.string()).optional().describe("Entries of the form destination:=source"),
});

export type RuleStructure = z.infer<typeof ruleStructureSchema>;

const stringList = z.array(z.string());

export const ruleDocumentSchema = z.object({
  apiVersion: z.string().min(1),
  kind: z.literal("rule"),
  meta: z.object({
    name: z.string().min(1),
    purpose: z.string(),
    description: z.string(),
    labels: z.record(stringList),
    annotations: z.record(stringList),
  }),
  spec: z.object({
    inputs: z.record(scalar),
    inputsMeta__: z.array(
      z.object({
        name: z.string().min(1),
        dataType: z.string().min(1),
        required: z.boolean(),
        defaultValue: scalar.optional(),
      })
    ),
    outputsMeta__: z.array(
      z.object({
        name: z.string().min(1),
        dataType: z.string().min(1),
        required: z.boolean().optional(),
        defaultValue: scalar.optional(),
      })
    ),
    tasks: z
      .array(
        z.object({
          name: z.string().min(1),
          alias: z.string().regex(/^t[1-9]\d*$/),
          type: z.literal("task"),
          appTags: z.record(stringList),
          purpose: z.string(),
        })
      )
      .min(1),
    ioMap: z.array(z.string()),
  }),
});

export type RuleDocument = z.infer<typeof ruleDocumentSchema>;
