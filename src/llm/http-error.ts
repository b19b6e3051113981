import { isAxiosError } from 'axios';
import { errorMessage } from '../common/errors';

export function describeHttpError(error: unknown): string {
  if (isAxiosError(error) && error.response) {
    return `${error.response.status} ${error.response.statusText}`.trim();
  }
  return errorMessage(error);
}
