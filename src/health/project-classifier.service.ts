import { Injectable } from '@nestjs/common';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ProjectType } from './interfaces/project-type.enum';

// Checked in order; the first marker present at the repository root wins.
const MARKER_FILES: ReadonlyArray<[string, ProjectType]> = [
  ['package.json', ProjectType.NodeJS],
  ['requirements.txt', ProjectType.Python],
];

@Injectable()
export class ProjectClassifierService {
  async detect(repoPath: string): Promise<ProjectType> {
    for (const [marker, type] of MARKER_FILES) {
      if (await fs.pathExists(path.join(repoPath, marker))) {
        return type;
      }
    }
    return ProjectType.Unknown;
  }
}
