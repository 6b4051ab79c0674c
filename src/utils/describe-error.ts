import { ZodError } from 'zod';
import { YAMLParseError } from 'yaml';
import { ConversionError } from '../errors.js';

export function describeError(err: unknown): string {
  if (err instanceof ConversionError) {
    if (err.details instanceof ZodError) {
      return `${err.message} (${formatZodIssues(err.details)})`;
    }
    if (err.details instanceof Error) {
      return `${err.message} (${err.details.message})`;
    }
    return err.message;
  }

  if (err instanceof ZodError) {
    return `validation_failed: ${formatZodIssues(err)}`;
  }

  if (err instanceof YAMLParseError) {
    return `yaml_parse_failed: ${err.message}`;
  }

  if (err instanceof Error) {
    return err.message;
  }

  return 'internal_error';
}

export function formatZodIssues(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
