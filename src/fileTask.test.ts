import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { gunzipSync, gzipSync, strFromU8, strToU8 } from 'fflate';
import { IOError, MalformedRecordError } from './errors';
import { createFileTask, runFileTask, temporaryPathFor, transformFile } from './fileTask';
import { createPolicy } from './sanitizer';
import { createRecordTransform } from './transforms';

const transform = createRecordTransform(createPolicy({ dropFields: ['_internal_debug'] }));

describe('file tasks', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'file-task-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeInput(name: string, content: string): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  test('temporaryPathFor hides the temporary file next to the output', () => {
    expect(temporaryPathFor('/out/day/metrics.json')).toBe('/out/day/.metrics.json.tmp');
  });

  test('transforms a file and creates parent directories', async () => {
    const input = writeInput('in.json', '{"user-id":1,"_internal_debug":"x"}\n{"event.type":"click"}\n');
    const output = path.join(tempDir, 'out', 'nested', 'in.json');

    const count = await transformFile(input, output, transform);

    expect(count).toBe(2);
    expect(fs.readFileSync(output, 'utf-8')).toBe('{"user_id":1}\n{"event_type":"click"}\n');
    expect(fs.existsSync(temporaryPathFor(output))).toBe(false);
  });

  test('transforms every member of a concatenated gzip input', async () => {
    const input = path.join(tempDir, 'appended.json.gz');
    fs.writeFileSync(input, Buffer.concat([gzipSync(strToU8('{"a-1":1}\n')), gzipSync(strToU8('{"b-2":2}\n'))]));
    const output = path.join(tempDir, 'out', 'appended.json.gz');

    const count = await transformFile(input, output, transform);

    expect(count).toBe(2);
    expect(strFromU8(gunzipSync(fs.readFileSync(output)))).toBe('{"a_1":1}\n{"b_2":2}\n');
  });

  test('writes number tokens exactly as they were read', async () => {
    const input = writeInput('numbers.json', '{"offset-id":12345678901234567891,"ratio":1.0}\n');
    const output = path.join(tempDir, 'out', 'numbers.json');

    await transformFile(input, output, transform);

    expect(fs.readFileSync(output, 'utf-8')).toBe('{"offset_id":12345678901234567891,"ratio":1.0}\n');
  });

  test('fails on invalid UTF-8 instead of replacing the bytes', async () => {
    const input = path.join(tempDir, 'latin.json');
    fs.writeFileSync(input, Buffer.concat([Buffer.from('{"a":"a'), Buffer.from([0xff, 0xfe]), Buffer.from('b"}\n')]));
    const output = path.join(tempDir, 'out', 'latin.json');

    await expect(transformFile(input, output, transform)).rejects.toBeInstanceOf(MalformedRecordError);
    expect(fs.existsSync(output)).toBe(false);
  });

  test('publishes nothing when a record is malformed', async () => {
    const input = writeInput('bad.json', '{"a":1}\n[1,2]\n');
    const output = path.join(tempDir, 'out', 'bad.json');

    await expect(transformFile(input, output, transform)).rejects.toMatchObject({
      name: 'MalformedRecordError',
      source: input,
      line: 2
    });
    expect(fs.existsSync(output)).toBe(false);
    expect(fs.existsSync(temporaryPathFor(output))).toBe(false);
  });

  test('removes stale output from an earlier run when the file fails', async () => {
    const input = writeInput('bad.json', '{"a":\n');
    const output = path.join(tempDir, 'out', 'bad.json');
    fs.mkdirSync(path.dirname(output), { recursive: true });
    fs.writeFileSync(output, '{"old":true}\n');

    await expect(transformFile(input, output, transform)).rejects.toBeInstanceOf(MalformedRecordError);
    expect(fs.existsSync(output)).toBe(false);
  });

  test('raises IOError for a missing input file', async () => {
    const output = path.join(tempDir, 'out', 'missing.json');
    await expect(transformFile(path.join(tempDir, 'missing.json'), output, transform)).rejects.toBeInstanceOf(IOError);
  });

  test('runFileTask records success with the record count', async () => {
    const input = writeInput('ok.json', '{"a-b":1}\n');
    const task = createFileTask(input, path.join(tempDir, 'out', 'ok.json'));

    const resolved = await runFileTask(task, transform);

    expect(task.status).toBe('pending');
    expect(resolved).toEqual({ ...task, status: 'succeeded', recordCount: 1 });
  });

  test('runFileTask records failures instead of throwing', async () => {
    const input = writeInput('bad.json', 'not json\n');
    const task = createFileTask(input, path.join(tempDir, 'out', 'bad.json'));

    const resolved = await runFileTask(task, transform);

    expect(resolved.status).toBe('failed');
    expect(resolved.error).toContain(`Malformed record (${input}:1)`);
  });

  test('runFileTask skips existing outputs when asked', async () => {
    const input = writeInput('ok.json', '{"a-b":1}\n');
    const output = path.join(tempDir, 'ok-out.json');
    fs.writeFileSync(output, 'existing\n');

    const resolved = await runFileTask(createFileTask(input, output), transform, { skipExisting: true });

    expect(resolved.status).toBe('skipped');
    expect(fs.readFileSync(output, 'utf-8')).toBe('existing\n');
  });

  test('runFileTask overwrites existing outputs by default', async () => {
    const input = writeInput('ok.json', '{"a-b":1}\n');
    const output = path.join(tempDir, 'ok-out.json');
    fs.writeFileSync(output, 'existing\n');

    const resolved = await runFileTask(createFileTask(input, output), transform);

    expect(resolved.status).toBe('succeeded');
    expect(fs.readFileSync(output, 'utf-8')).toBe('{"a_b":1}\n');
  });
});
