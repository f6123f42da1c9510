import 'reflect-metadata';
import { z } from 'zod';

export const ZOD_SCHEMA_METADATA = 'presence:zod-schema';

/**
 * Attaches a zod schema to a DTO class. `ZodValidationPipe` looks it up
 * from the parameter's metatype and parses the incoming value with it.
 */
export function ZodSchema(schema: z.ZodType): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(ZOD_SCHEMA_METADATA, schema, target);
  };
}

export function getZodSchema(target: unknown): z.ZodType | undefined {
  if (typeof target !== 'function') return undefined;
  const schema: unknown = Reflect.getMetadata(ZOD_SCHEMA_METADATA, target);
  return schema instanceof z.ZodType ? schema : undefined;
}
