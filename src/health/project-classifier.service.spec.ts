import { createFixtureTree, removeFixtureTree } from '../testing/fixture-tree';
import { ProjectType } from './interfaces/project-type.enum';
import { ProjectClassifierService } from './project-classifier.service';

describe('ProjectClassifierService', () => {
  const classifier = new ProjectClassifierService();
  const roots: string[] = [];

  const tree = async (spec: Record<string, string>) => {
    const root = await createFixtureTree(spec);
    roots.push(root);
    return root;
  };

  afterEach(async () => {
    await Promise.all(roots.splice(0).map(removeFixtureTree));
  });

  it('detects a Node project from a root package.json', async () => {
    const root = await tree({ 'package.json': '{}' });
    await expect(classifier.detect(root)).resolves.toBe(ProjectType.NodeJS);
  });

  it('prefers package.json when requirements.txt is also present', async () => {
    const root = await tree({ 'package.json': '{}', 'requirements.txt': 'flask\n' });
    await expect(classifier.detect(root)).resolves.toBe(ProjectType.NodeJS);
  });

  it('detects a Python project from a root requirements.txt', async () => {
    const root = await tree({ 'requirements.txt': 'flask\n' });
    await expect(classifier.detect(root)).resolves.toBe(ProjectType.Python);
  });

  it('returns Unknown when neither marker is present', async () => {
    const root = await tree({ 'main.go': 'package main\n' });
    await expect(classifier.detect(root)).resolves.toBe(ProjectType.Unknown);
  });

  it('only looks at the repository root', async () => {
    const root = await tree({ 'web/package.json': '{}', 'api/requirements.txt': 'flask\n' });
    await expect(classifier.detect(root)).resolves.toBe(ProjectType.Unknown);
  });
});
