import Ajv, { type Schema } from "ajv";
import { ConfigError } from "../errors";

const ajv = new Ajv({ allErrors: true, strict: false });

export function validateSchema<T>(
  schema: Schema,
  data: unknown,
  name: string,
): T {
  const validate = ajv.compile<T>(schema);
  if (!validate(data)) {
    throw new ConfigError(
      `[${name} schema invalid] ${ajv.errorsText(validate.errors)}`,
    );
  }
  return data;
}
