/** Directory names never descended into when sampling source. */
export const IGNORED_DIRECTORIES: ReadonlySet<string> = new Set(['.git', 'node_modules', 'venv', '__pycache__']);

export const SOURCE_EXTENSIONS: readonly string[] = [
  '.js',
  '.py',
  '.html',
  '.css',
  '.jsx',
  '.ts',
  '.tsx',
  '.java',
  '.go',
  '.rs',
];
