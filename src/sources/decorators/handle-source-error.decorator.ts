import { isAxiosError } from 'axios';

import {
  PriceNotFoundException,
  SourceApiException,
  SourceException,
  SourceUnauthorizedException,
} from '../exceptions';
import { describeSubject } from '../source-adapter.helpers';
import { SourceAdapter } from '../source-adapter.interface';
import { SourceName } from '../source-name.enum';

function toSourceException(
  error: unknown,
  sourceName: SourceName,
  subject: string | undefined,
): SourceException {
  if (error instanceof SourceException) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;

    if ((status === 400 || status === 404) && subject) {
      return new PriceNotFoundException(subject, sourceName);
    }

    if (status === 401 || status === 403) {
      return new SourceUnauthorizedException(sourceName, status);
    }

    return new SourceApiException(sourceName, error, status);
  }

  return new SourceApiException(
    sourceName,
    error instanceof Error ? error : new Error(String(error)),
  );
}

/**
 * Maps whatever an adapter method throws onto the SourceException hierarchy.
 * The first argument of the decorated method names the symbol or pair.
 */
export function HandleSourceError() {
  return function (
    _target: SourceAdapter,
    _propertyKey: string,
    descriptor: PropertyDescriptor,
  ): PropertyDescriptor {
    const originalMethod: unknown = descriptor.value;
    if (typeof originalMethod !== 'function') {
      return descriptor;
    }

    descriptor.value = async function (
      this: SourceAdapter,
      ...args: unknown[]
    ): Promise<unknown> {
      try {
        return await originalMethod.apply(this, args);
      } catch (error) {
        throw toSourceException(error, this.name, describeSubject(args[0]));
      }
    };

    return descriptor;
  };
}
