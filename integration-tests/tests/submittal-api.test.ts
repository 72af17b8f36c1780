/**
 * Submittal API
 *
 * The express app on an ephemeral port, backed by a temp object store and an
 * in-memory queue.
 */

import fs from 'fs';
import path from 'path';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import {
  NotFoundError,
  StructureStore,
  parseStructure,
  serializeStructure,
  type AssembleSubmittalJob,
  type Structure,
} from '@submittal/shared';
import {
  createApp,
  type AssembleQueue,
  type Backpressure,
} from '../../services/submittal-api/src/app';
import {
  discoverDirectory,
  discoverFiles,
  isSupportedFile,
} from '../../services/submittal-api/src/lib/discovery';
import {
  outputFilenameFor,
  parseAssembleRequest,
  parseCreateStructureRequest,
} from '../../services/submittal-api/src/lib/requests';
import { FakeTextExtractor, SCENARIO_FILES, makeTempDir, removeDir } from './helpers';

class FakeAssembleQueue implements AssembleQueue {
  readonly jobs: Array<{ jobId: string; job: AssembleSubmittalJob }> = [];
  state: Backpressure = { shouldWarn: false, shouldReject: false, depth: 0 };

  async enqueue(jobId: string, job: AssembleSubmittalJob): Promise<void> {
    this.jobs.push({ jobId, job });
  }

  async backpressure(): Promise<Backpressure> {
    return this.state;
  }
}

interface ApiResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(body: unknown, key: string): string {
  const value = isRecord(body) ? body[key] : undefined;
  if (typeof value !== 'string') {
    throw new Error(`response has no string ${key}`);
  }
  return value;
}

function structureField(body: unknown): Structure {
  return parseStructure(isRecord(body) ? body.structure : undefined);
}

describe('submittal-api', () => {
  let root: string;
  let sourceDir: string;
  let store: StructureStore;
  let queue: FakeAssembleQueue;
  let server: Server;
  let baseUrl: string;
  let metricsReports = 0;

  beforeAll(async () => {
    root = makeTempDir();
    sourceDir = path.join(root, 'input');
    fs.mkdirSync(sourceDir, { recursive: true });
    for (const filename of [...SCENARIO_FILES, 'notes.txt', '.hidden.pdf', '~$lock.docx']) {
      fs.writeFileSync(path.join(sourceDir, filename), 'placeholder');
    }

    store = new StructureStore(path.join(root, 'store'));
    queue = new FakeAssembleQueue();
    const app = createApp({
      store,
      queue,
      textExtractor: new FakeTextExtractor(),
      reportMetrics: async () => {
        metricsReports++;
      },
    });

    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    removeDir(root);
  });

  beforeEach(() => {
    queue.jobs.length = 0;
    queue.state = { shouldWarn: false, shouldReject: false, depth: 0 };
  });

  async function call(
    method: string,
    route: string,
    body?: unknown,
    headers: Record<string, string> = {}
  ): Promise<ApiResponse> {
    const response = await fetch(`${baseUrl}${route}`, {
      method,
      headers: { 'Content-Type': 'application/json', ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();
    let parsed: unknown = text;
    try {
      parsed = JSON.parse(text);
    } catch {
      // plain-text body, e.g. /metrics
    }
    return { status: response.status, headers: response.headers, body: parsed };
  }

  async function createStructure(): Promise<{ id: string; structure: Structure }> {
    const response = await call('POST', '/structures', { source_dir: sourceDir, mode: 'filename' });
    expect(response.status).toBe(201);
    return {
      id: stringField(response.body, 'structure_id'),
      structure: structureField(response.body),
    };
  }

  describe('GET /health', () => {
    it('reports the queue depth', async () => {
      queue.state = { shouldWarn: false, shouldReject: false, depth: 4 };
      const response = await call('GET', '/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        service: 'submittal-api',
        queue_depth: 4,
      });
    });
  });

  describe('GET /metrics', () => {
    it('refreshes queue gauges and serves prometheus text', async () => {
      const before = metricsReports;
      const response = await call('GET', '/metrics');

      expect(response.status).toBe(200);
      expect(metricsReports).toBe(before + 1);
      expect(typeof response.body).toBe('string');
      expect(String(response.body)).toContain('submittal_');
    });
  });

  describe('POST /structures', () => {
    it('extracts and persists a structure from a directory', async () => {
      const response = await call('POST', '/structures', {
        source_dir: sourceDir,
        mode: 'filename',
      });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({ failures: [], ambiguities: [], tag_ambiguities: [] });
      const structure = structureField(response.body);
      expect(structure.groups.map((g) => g.tag)).toEqual(['MAU-5', 'AHU-10']);
      expect(structure.cut_sheets?.documents.map((d) => d.filename)).toEqual(['CS_Filter.pdf']);
      expect(structure.groups[0].documents[0].path).toBe(
        path.join(sourceDir, 'MAU-5 - Technical Data Sheet.docx')
      );

      const id = stringField(response.body, 'structure_id');
      expect(serializeStructure(await store.loadStructure(id))).toBe(serializeStructure(structure));
    });

    it('accepts an explicit file list', async () => {
      const response = await call('POST', '/structures', {
        files: [path.join(sourceDir, 'CS_Filter.pdf'), path.join(sourceDir, 'notes.txt')],
      });

      expect(response.status).toBe(201);
      const structure = structureField(response.body);
      expect(structure.groups).toEqual([]);
      expect(structure.cut_sheets?.documents).toHaveLength(1);
    });

    it('echoes the correlation id', async () => {
      const response = await call(
        'POST',
        '/structures',
        {},
        { 'X-Correlation-Id': 'test-correlation' }
      );

      expect(response.headers.get('x-correlation-id')).toBe('test-correlation');
      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: {
          code: 'invalid_request',
          message: 'source_dir or files is required',
          correlation_id: 'test-correlation',
        },
      });
    });

    it('rejects a selection with no supported files', async () => {
      const response = await call('POST', '/structures', {
        files: [path.join(sourceDir, 'notes.txt')],
      });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: { code: 'invalid_request', message: 'No supported input files found' },
      });
    });
  });

  describe('GET /structures/:id', () => {
    it('returns the stored structure', async () => {
      const { id, structure } = await createStructure();
      const response = await call('GET', `/structures/${id}`);

      expect(response.status).toBe(200);
      expect(parseStructure(response.body)).toEqual(structure);
    });

    it('answers 404 for an unknown id', async () => {
      const response = await call('GET', '/structures/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({
        error: {
          code: 'not_found',
          message: 'Structure unknown not found',
          correlation_id: expect.any(String),
        },
      });
    });
  });

  describe('PUT /structures/:id', () => {
    it('saves a reordered structure', async () => {
      const { id, structure } = await createStructure();
      const edited: Structure = JSON.parse(serializeStructure(structure));
      edited.groups[0].order = 2;
      edited.groups[1].order = 1;
      edited.groups[1].display_name = 'Air Handler 10';

      const response = await call('PUT', `/structures/${id}`, edited);

      expect(response.status).toBe(200);
      const saved = await store.loadStructure(id);
      expect(saved.groups.map((g) => [g.tag, g.display_name, g.order])).toEqual([
        ['AHU-10', 'Air Handler 10', 1],
        ['MAU-5', 'MAU-5', 2],
      ]);
    });

    it('rejects an invalid structure with 400', async () => {
      const { id } = await createStructure();
      const response = await call('PUT', `/structures/${id}`, { schema_version: '1.0' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'invalid_structure' } });
    });

    it('answers 404 for an unknown id', async () => {
      const { structure } = await createStructure();
      const response = await call('PUT', '/structures/unknown', structure);
      expect(response.status).toBe(404);
    });
  });

  describe('POST /structures/:id/retag', () => {
    it('moves a document and persists the rebuilt structure', async () => {
      const { id } = await createStructure();
      const response = await call('POST', `/structures/${id}/retag`, {
        retags: { 'AHU-10 - Fan Curve.jpg': 'MAU-5' },
      });

      expect(response.status).toBe(200);
      const saved = await store.loadStructure(id);
      expect(saved.groups[0].documents.map((d) => d.filename)).toEqual([
        'MAU-5 - Technical Data Sheet.docx',
        'AHU-10 - Fan Curve.jpg',
      ]);
      expect(structureField(response.body)).toEqual(saved);
    });

    it('rejects a malformed tag', async () => {
      const { id } = await createStructure();
      const response = await call('POST', `/structures/${id}/retag`, {
        retags: { 'CS_Filter.pdf': 'filter' },
      });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'invalid_structure' } });
    });

    it('rejects a body without retags', async () => {
      const { id } = await createStructure();
      const response = await call('POST', `/structures/${id}/retag`, { 'CS_Filter.pdf': 'AHU-1' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'invalid_request' } });
    });
  });

  describe('POST /structures/:id/assemble', () => {
    it('enqueues a job and records it as pending', async () => {
      const { id } = await createStructure();
      const response = await call(
        'POST',
        `/structures/${id}/assemble`,
        { quality_mode: 'maximum', filter_pricing: false },
        { 'X-Correlation-Id': 'assemble-correlation' }
      );

      expect(response.status).toBe(202);
      const jobId = stringField(response.body, 'job_id');
      expect(queue.jobs).toEqual([
        {
          jobId,
          job: {
            correlation_id: 'assemble-correlation',
            structure_id: id,
            filter_pricing: false,
            quality_mode: 'maximum',
            output_filename: `Submittal_${id}.pdf`,
          },
        },
      ]);

      const status = await call('GET', `/jobs/${jobId}`);
      expect(status.status).toBe(200);
      expect(status.body).toEqual({ job_id: jobId, structure_id: id, status: 'pending' });
    });

    it('refuses new work under backpressure', async () => {
      const { id } = await createStructure();
      queue.state = { shouldWarn: true, shouldReject: true, depth: 500 };

      const response = await call('POST', `/structures/${id}/assemble`, {});

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ error: { code: 'service_unavailable' } });
      expect(queue.jobs).toEqual([]);
    });

    it('answers 404 for an unknown structure', async () => {
      const response = await call('POST', '/structures/unknown/assemble', {});

      expect(response.status).toBe(404);
      expect(queue.jobs).toEqual([]);
    });

    it('rejects an output filename with a path', async () => {
      const { id } = await createStructure();
      const response = await call('POST', `/structures/${id}/assemble`, {
        output_filename: '../elsewhere.pdf',
      });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: { code: 'invalid_request', message: 'output_filename must be a plain file name' },
      });
    });
  });

  describe('GET /jobs/:id', () => {
    it('answers 404 for an unknown job', async () => {
      const response = await call('GET', '/jobs/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({
        error: { code: 'not_found', message: 'Job unknown not found' },
      });
    });
  });
});

describe('request parsing', () => {
  it('validates create-structure bodies', () => {
    expect(parseCreateStructureRequest({ source_dir: '/in', mode: 'content' })).toEqual({
      ok: true,
      value: { source_dir: '/in', mode: 'content' },
    });
    expect(parseCreateStructureRequest({ files: ['/in/a.pdf', 3] })).toEqual({
      ok: false,
      message: 'files must be an array of paths',
    });
    expect(parseCreateStructureRequest({ source_dir: '/in', mode: 'ocr' })).toEqual({
      ok: false,
      message: 'mode must be "filename" or "content"',
    });
  });

  it('validates assemble bodies', () => {
    expect(parseAssembleRequest(undefined)).toEqual({ ok: true, value: {} });
    expect(parseAssembleRequest({ quality_mode: 'ultra' })).toEqual({
      ok: false,
      message: 'quality_mode must be one of fast, balanced, high, maximum',
    });
    expect(parseAssembleRequest({ filter_pricing: 'yes' })).toEqual({
      ok: false,
      message: 'filter_pricing must be a boolean',
    });
  });

  it('defaults and normalizes output filenames', () => {
    expect(outputFilenameFor('S1')).toBe('Submittal_S1.pdf');
    expect(outputFilenameFor('S1', 'Job 12')).toBe('Job 12.pdf');
    expect(outputFilenameFor('S1', 'Final.PDF')).toBe('Final.PDF');
  });
});

describe('input discovery', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    for (const filename of [...SCENARIO_FILES, 'notes.txt', '.hidden.pdf', '~$lock.docx']) {
      fs.writeFileSync(path.join(dir, filename), 'placeholder');
    }
    fs.mkdirSync(path.join(dir, 'nested.pdf'));
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('lists supported files sorted by filename', async () => {
    const files = await discoverDirectory(dir);

    expect(files.map((f) => f.filename)).toEqual([
      'AHU-10 - Fan Curve.jpg',
      'AHU-10 - Technical Data Sheet.docx',
      'CS_Filter.pdf',
      'MAU-5 - Technical Data Sheet.docx',
    ]);
    expect(files[0]).toEqual({
      filename: 'AHU-10 - Fan Curve.jpg',
      path: path.join(dir, 'AHU-10 - Fan Curve.jpg'),
      size_bytes: 'placeholder'.length,
    });
  });

  it('fails on a named file that does not exist', async () => {
    await expect(discoverFiles([path.join(dir, 'missing.pdf')])).rejects.toThrow();
  });

  it('knows the supported extensions', () => {
    expect(isSupportedFile('Drawing.PDF')).toBe(true);
    expect(isSupportedFile('Drawing.dwg')).toBe(false);
  });
});

describe('StructureStore', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('reports a missing structure as NotFoundError', async () => {
    const attempt = new StructureStore(root).loadStructure('unknown');

    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toThrow('Structure unknown not found');
  });

  it('has no result for a job it never saw', async () => {
    await expect(new StructureStore(root).loadJobResult('unknown')).resolves.toBeNull();
  });

  it('keeps scratch folders per job', () => {
    const store = new StructureStore(root);
    expect(store.rendersDir('job-1')).toBe(path.join(root, 'renders', 'job-1'));
    expect(store.titlesDir('job-1')).toBe(path.join(root, 'titles', 'job-1'));
    expect(() => store.rendersDir('../escape')).toThrow(NotFoundError);
  });
});
