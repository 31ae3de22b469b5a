/**
 * File system interface (platform abstraction)
 * Implementation is provided by the runtime package
 */
export interface IFileSystem {
  readFile(path: string, encoding: 'utf-8'): Promise<string>;
  exists(path: string): Promise<boolean>;
}
