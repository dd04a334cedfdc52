/**
 * Shared ajv instance factory.
 *
 * ajv ships CommonJS with the class on `.default`; under NodeNext the default
 * import is the module object.
 */

import AjvModule from 'ajv';
import type { ErrorObject } from 'ajv';

const Ajv = AjvModule.default;

export function createAjv(): InstanceType<typeof Ajv> {
  return new Ajv({ allErrors: true });
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'Unknown validation error';
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ');
}
