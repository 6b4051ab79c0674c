import YAML, { type DocumentOptions, type ParseOptions, type SchemaOptions } from 'yaml';

export type YamlOptions = ParseOptions & DocumentOptions & SchemaOptions;

export type YamlParseResult = {
  data: unknown;
  warnings: string[];
};

/**
 * Parses a single YAML document. The first error is thrown; warnings are
 * returned so callers can log them instead of `process.emitWarning`.
 */
export function parseYaml(text: string, options: YamlOptions = {}): YamlParseResult {
  const doc = YAML.parseDocument(text, options);
  const [error] = doc.errors;
  if (error) throw error;
  return {
    data: doc.toJS(),
    warnings: doc.warnings.map((warning) => warning.message),
  };
}
