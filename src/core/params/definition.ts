import { type AnyZodObject, type ZodType, type ZodTypeDef, z } from "zod";

const PARAMS_DEFINITION = Symbol.for("handlerkit.params-definition");

/**
 * A params type: a zod object schema whose fields carry binding annotations.
 *
 * @example
 * const ListParams = defineParams(
 *   z.object({ page: z.number().int().min(1), sort: z.string() }),
 *   { page: "query=page,default=1", sort: "query=sort,header=X-Sort" },
 * );
 */
export interface ParamsDefinition<P> {
  readonly [PARAMS_DEFINITION]: true;
  readonly schema: AnyZodObject;
  readonly tags: Readonly<Record<string, string>>;
  /** Types the bound record once every field has been checked */
  readonly assemble: ZodType<P, ZodTypeDef, unknown>;
}

export type ParamsOf<T> = T extends ParamsDefinition<infer P> ? P : never;

export type ParamTags<T extends AnyZodObject> = { readonly [K in keyof T["shape"]]?: string };

export const defineParams = <T extends AnyZodObject>(
  schema: T,
  tags: ParamTags<T>,
): ParamsDefinition<z.output<T>> => {
  const annotations: Record<string, string> = {};
  for (const [field, tag] of Object.entries(tags)) {
    if (typeof tag === "string") annotations[field] = tag;
  }

  return {
    [PARAMS_DEFINITION]: true,
    schema,
    tags: annotations,
    assemble: z.custom<z.output<T>>((value) => typeof value === "object" && value !== null),
  };
};

export const isParamsDefinition = (value: unknown): value is ParamsDefinition<unknown> =>
  typeof value === "object" && value !== null && PARAMS_DEFINITION in value;
