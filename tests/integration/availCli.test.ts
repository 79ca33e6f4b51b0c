import { describe, it, expect } from '@jest/globals';
import { USAGE, runAvailCli, type CliIo } from '../../src/cli/availCli.js';
import { loadServiceConfig } from '../../src/infra/config.js';
import { buildAvailRequestXml } from '../../src/services/availRequestXmlBuilder.js';
import { NOW, readFixture, validInput } from '../helpers/availFixtures.js';

const serviceConfig = loadServiceConfig({ NODE_ENV: 'test' });

function fakeIo(files: Record<string, string>) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = {
    readInput: (path) => {
      const text = files[path];
      if (text === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      return text;
    },
    stdout: (text) => { out.push(text); },
    stderr: (text) => { err.push(text); },
    now: NOW,
  };
  return { io, out, err };
}

describe('runAvailCli', () => {
  it('prints the priced response and exits 0', () => {
    const { io, out, err } = fakeIo({ 'request.xml': buildAvailRequestXml(validInput()) });

    expect(runAvailCli(['request.xml'], serviceConfig, io)).toBe(0);
    expect(err).toEqual([]);
    expect(JSON.parse(out[0])).toHaveLength(3);
  });

  it('prints a rule violation as an error body and still exits 0', () => {
    const { io, out } = fakeIo({ 'request.xml': readFixture('avail-rq-two-nights.xml') });

    expect(runAvailCli(['request.xml'], serviceConfig, io)).toBe(0);
    expect(out).toEqual(['{"error":"Start date must be at least 2 days after today."}']);
  });

  it('enforces child accompaniment when the flag is passed', () => {
    const { io, out } = fakeIo({ '-': buildAvailRequestXml(validInput({ rooms: [[2, 4]] })) });

    expect(runAvailCli(['-', '--enforce-child-accompaniment'], serviceConfig, io)).toBe(0);
    expect(out).toEqual(['{"error":"Room 1 has children but no accompanying adult."}']);
  });

  it('enforces child accompaniment when the service config enables it', () => {
    const { io, out } = fakeIo({ 'request.xml': buildAvailRequestXml(validInput({ rooms: [[2]] })) });
    const strictConfig = loadServiceConfig({ NODE_ENV: 'test', AVAIL_ENFORCE_CHILD_ACCOMPANIMENT: 'true' });

    expect(runAvailCli(['request.xml'], strictConfig, io)).toBe(0);
    expect(out).toEqual(['{"error":"Room 1 has children but no accompanying adult."}']);
  });

  it.each([[[]], [['a.xml', 'b.xml']], [['request.xml', '--verbose']]])('prints usage for %j', (argv) => {
    const { io, out, err } = fakeIo({ 'request.xml': '<AvailRQ/>' });

    expect(runAvailCli(argv, serviceConfig, io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([USAGE]);
  });

  it('exits 1 for a malformed document', () => {
    const { io, out, err } = fakeIo({ 'request.xml': '<AvailRQ>' });

    expect(runAvailCli(['request.xml'], serviceConfig, io)).toBe(1);
    expect(out).toEqual([]);
    expect(err[0]).toMatch(/^Invalid XML: /);
  });

  it('exits 1 when the input cannot be read', () => {
    const { io, err } = fakeIo({});

    expect(runAvailCli(['missing.xml'], serviceConfig, io)).toBe(1);
    expect(err).toEqual(["ENOENT: no such file or directory, open 'missing.xml'"]);
  });
});
