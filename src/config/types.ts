import { StaticDecode } from '@sinclair/typebox';

import { configValidationSchema } from './schema';

export type Config = StaticDecode<typeof configValidationSchema>;
