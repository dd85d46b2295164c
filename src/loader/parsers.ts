import yaml from 'js-yaml';
import type { DocumentParser } from './types.js';

const CONFIG_SCHEMA = yaml.CORE_SCHEMA.extend([yaml.types.merge]);

/**
 * YAML documents, read with the core schema plus merge keys (`<<`), so that
 * timestamps and binary blobs stay plain strings.
 */
export class YamlParser implements DocumentParser {
  readonly format = 'yaml';
  readonly extensions = ['.yaml', '.yml'] as const;

  parse(text: string, source: string): unknown {
    return yaml.load(text, { filename: source, schema: CONFIG_SCHEMA });
  }
}

export class JsonParser implements DocumentParser {
  readonly format = 'json';
  readonly extensions = ['.json'] as const;

  parse(text: string, _source: string): unknown {
    if (text.trim() === '') return null;
    return JSON.parse(text);
  }
}
