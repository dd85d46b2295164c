export { ConfigLoader, loadConfigFile } from './loader.js';
export type { ConfigLoaderOptions, LoadOptions } from './loader.js';
export { YamlParser, JsonParser } from './parsers.js';
export type { DocumentParser } from './types.js';
