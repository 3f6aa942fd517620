import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { RepositoryClient } from '../src/repository/RepositoryClient.js';
import { DatasetRepositoryClient } from '../src/repository/DatasetRepositoryClient.js';
import { FileCredentialStore } from '../src/hub/credentials.js';
import { createEndpointResolver } from '../src/hub/endpoint.js';
import { makeTempDir } from './helpers/fakes.js';

const execP = promisify(execFile);

async function git(args: string[], cwd: string) {
  const { stdout } = await execP('git', args, { cwd });
  return stdout.trim();
}

// Bare remote at <hubRoot>/<repoPath>.git holding one commit on master.
async function makeBareRemote(hubRoot: string, repoPath: string) {
  const seed = await fs.mkdtemp(path.join(hubRoot, 'seed-'));
  await fs.writeFile(path.join(seed, 'README.md'), '# seed\n', 'utf8');
  await git(['init', '-b', 'master'], seed);
  await git(['add', '.'], seed);
  await git(['-c', 'user.name=seed', '-c', 'user.email=seed@example.com', 'commit', '-m', 'init'], seed);
  const bare = path.join(hubRoot, `${repoPath}.git`);
  await fs.mkdir(path.dirname(bare), { recursive: true });
  await git(['clone', '--bare', seed, bare], hubRoot);
  await fs.rm(seed, { recursive: true, force: true });
  return bare;
}

describe('repository clients against a local bare remote', () => {
  let tmp: string;
  let hubRoot: string;
  let credentials: FileCredentialStore;
  const originalHome = process.env.HOME;

  beforeAll(async () => {
    tmp = await makeTempDir('hub-e2e-');
    hubRoot = path.join(tmp, 'hub');
    await fs.mkdir(hubRoot, { recursive: true });
    // keep git lfs install and any global config inside the sandbox
    process.env.HOME = tmp;
    credentials = new FileCredentialStore(path.join(tmp, 'credentials'));
    await credentials.saveToken('test-secret');
    await credentials.saveUserInfo({ name: 'Test User', email: 'test@example.com' });
  });

  afterAll(async () => {
    if (originalHome === undefined) delete process.env.HOME;
    else process.env.HOME = originalHome;
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it('clones a model, reuses the checkout and pushes a new commit', async () => {
    const bare = await makeBareRemote(hubRoot, 'org/model');
    const endpoint = createEndpointResolver(`file://${hubRoot}`);
    const modelDir = path.join(tmp, 'work', 'model');

    const first = await RepositoryClient.open({ modelDir, modelId: 'org/model', credentials, endpoint });
    expect(first.cloned).toBe(true);
    expect(await fs.readFile(path.join(modelDir, 'README.md'), 'utf8')).toBe('# seed\n');
    expect(await git(['config', 'user.email'], modelDir)).toBe('test@example.com');

    const second = await RepositoryClient.open({ modelDir, modelId: 'org/model', credentials, endpoint });
    expect(second.cloned).toBe(false);

    await fs.writeFile(path.join(modelDir, 'config.json'), '{"hidden_size": 8}\n', 'utf8');
    await second.push('add config');

    expect(await git(['log', '-1', '--format=%s', 'master'], bare)).toBe('add config');
    expect(await git(['log', '-1', '--format=%ae', 'master'], bare)).toBe('test@example.com');
  });

  it('clones a dataset once', async () => {
    await makeBareRemote(hubRoot, 'datasets/org/ds');
    const endpoint = createEndpointResolver(`file://${hubRoot}`);
    const workDir = path.join(tmp, 'work', 'ds');

    const client = await DatasetRepositoryClient.create({ workDir, datasetId: 'org/ds', credentials, endpoint });

    expect(await client.clone()).toBe(workDir);
    expect(await client.clone()).toBe('');
  });
});
