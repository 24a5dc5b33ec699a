// =====================================================
// Competition Source Tests
// =====================================================

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { ERROR_CODES } from '@scoutline/shared-types';
import { createMockTransport } from '../../../test/helpers/http.helper';
import { AppError } from '../../utils/errors';
import { ApiSession, ScoutingApiClient } from '../scouting-api';
import { ApiCompetitionSource, FileCompetitionSource } from './competition-source';

const appRoot = resolve(__dirname, '../../..');

describe('FileCompetitionSource', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'competitions-'));
    await writeFile(join(tempDir, 'object.json'), '{"Id": 1001}');
    await writeFile(join(tempDir, 'broken.json'), '[{"Id": 1001');
    await writeFile(join(tempDir, 'scalars.json'), '[1001, 1002]');
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads the bundled reference file', async () => {
    const source = new FileCompetitionSource('data/competitions.json', appRoot);

    const competitions = await source.load();

    expect(competitions.map((competition) => competition.Id)).toEqual([1001, 1002, 2001]);
    expect(source.description).toBe(`file ${join(appRoot, 'data/competitions.json')}`);
  });

  it('rejects a missing file', async () => {
    const error = await new FileCompetitionSource('missing.json', tempDir).load().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: ERROR_CODES.VALIDATION_ERROR });
    expect(String(error)).toContain(`Could not read competitions file ${join(tempDir, 'missing.json')}`);
  });

  it('rejects malformed JSON', async () => {
    await expect(new FileCompetitionSource('broken.json', tempDir).load()).rejects.toThrow(
      `Could not read competitions file ${join(tempDir, 'broken.json')}`
    );
  });

  it.each([['object.json'], ['scalars.json']])('rejects %s as not a list of records', async (file) => {
    await expect(new FileCompetitionSource(file, tempDir).load()).rejects.toThrow(
      `Competitions file ${join(tempDir, file)} is not a list of competition records`
    );
  });
});

describe('ApiCompetitionSource', () => {
  it('loads competitions through the API client', async () => {
    const transport = createMockTransport((request) =>
      request.url === '/login'
        ? { status: 200, data: { token: 'test-token' } }
        : { status: 200, data: [{ Id: 1001 }] }
    );
    const options = { baseUrl: 'https://api.test', timeoutMs: 1000, adapter: transport.adapter };
    const session = new ApiSession({ email: 'scout@example.test', password: 'test-secret' }, options);
    const source = new ApiCompetitionSource(new ScoutingApiClient(session, options));

    await expect(source.load()).resolves.toEqual([{ Id: 1001 }]);
    expect(transport.requests.map((request) => request.url)).toEqual(['/login', '/competitions']);
  });
});
