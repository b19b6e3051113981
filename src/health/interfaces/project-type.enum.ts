export enum ProjectType {
  NodeJS = 'nodejs',
  Python = 'python',
  Unknown = 'unknown',
}

export interface Toolchain {
  buildCommand: string;
  testCommand: string;
}
