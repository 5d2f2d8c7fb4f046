import { type Static, Type } from "@sinclair/typebox";

export const FilemapConfigSchema = Type.Object(
  {
    sourceDir: Type.Optional(
      Type.String({ minLength: 1, description: "Default source directory" }),
    ),
    destDir: Type.Optional(
      Type.String({ minLength: 1, description: "Default destination root" }),
    ),
    verbosity: Type.Optional(
      Type.Integer({
        minimum: 0,
        maximum: 3,
        description: "Baseline verbosity, added to the -v count",
      }),
    ),
    exclusive: Type.Optional(
      Type.Boolean({ description: "Fail planning when a file matches more than one rule" }),
    ),
  },
  { additionalProperties: false },
);

export type FilemapConfig = Static<typeof FilemapConfigSchema>;
