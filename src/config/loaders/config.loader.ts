import { Value } from '@sinclair/typebox/value';

import { envLoader } from './env.loader';
import { yamlLoader } from './yaml.loader';
import { configValidationSchema } from '../schema';
import { Config } from '../types';
import { deepMerge } from '../utils/object.util';
import { handleValidationError } from '../utils/validation-error.util';

export function configLoader(env: NodeJS.ProcessEnv): Config {
  const { configFile, overrides } = envLoader(env);
  const document = deepMerge(yamlLoader(configFile), overrides);

  try {
    return Value.Parse(configValidationSchema, document);
  } catch (error) {
    handleValidationError(error, 'Invalid configuration');
  }
}
