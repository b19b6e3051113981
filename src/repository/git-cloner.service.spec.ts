const mockClone = jest.fn();
jest.mock('simple-git', () => ({
  __esModule: true,
  default: jest.fn(() => ({ clone: mockClone })),
}));

import { GitClonerService, normalizeRepoUrl } from './git-cloner.service';
import { RepositoryCloneError } from './repository-cloner.interface';

describe('GitClonerService', () => {
  const service = new GitClonerService();

  beforeEach(() => {
    mockClone.mockReset();
  });

  it('shallow-clones into the destination', async () => {
    mockClone.mockResolvedValue('');

    await service.clone('https://github.com/acme/demo.git', '/tmp/ws');

    expect(mockClone).toHaveBeenCalledWith('https://github.com/acme/demo.git', '/tmp/ws', ['--depth', '1']);
  });

  it('wraps git failures in a RepositoryCloneError', async () => {
    mockClone.mockRejectedValue(new Error('fatal: repository not found'));

    const attempt = service.clone('https://github.com/acme/missing', '/tmp/ws');

    await expect(attempt).rejects.toBeInstanceOf(RepositoryCloneError);
    await expect(attempt).rejects.toMatchObject({
      message: 'fatal: repository not found',
      repoUrl: 'https://github.com/acme/missing',
    });
  });
});

describe('normalizeRepoUrl', () => {
  it('drops the query string', () => {
    expect(normalizeRepoUrl('https://github.com/acme/demo?tab=readme-ov-file')).toBe('https://github.com/acme/demo');
  });

  it('trims surrounding whitespace', () => {
    expect(normalizeRepoUrl('  https://github.com/acme/demo.git \n')).toBe('https://github.com/acme/demo.git');
  });
});
