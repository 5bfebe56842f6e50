import { mkdtempSync, readFileSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { fakeAdapter, RecordedRequest } from '../../test/helpers/fakeAdapter';
import { ConfigurationError } from '../api/errors';
import { Session } from '../api/session';
import { buildRecordingReport, recordingReportMain, validateReportArgs } from './recordingReport';

const BASE = 'https://api.example.test/v1';
const SUMMARY = `${BASE}/recordingReport/accessSummary`;
const DETAIL = `${BASE}/recordingReport/accessDetail`;

const weekly = { recordingId: 'r1', topic: 'Weekly sync', timeRecorded: '2024-01-29T10:00:00Z' };
const townHall = { recordingId: 'r2', topic: 'Town hall', timeRecorded: '2024-01-26T16:00:00Z' };

function reportServer(request: RecordedRequest) {
  if (request.url === SUMMARY) {
    return { data: { items: [weekly] }, headers: { link: `<${SUMMARY}?page=2>; rel="next"` } };
  }
  if (request.url === `${SUMMARY}?page=2`) {
    return { data: { items: [townHall] } };
  }
  if (request.url === DETAIL && request.params.recordingId === 'r1') {
    return {
      data: {
        items: [{ name: 'Dana', email: 'dana@x.com', accessTime: '2024-01-30T09:00:00Z', viewed: true, downloaded: false }],
      },
    };
  }
  return { data: { items: [] } };
}

describe('buildRecordingReport', () => {
  it('flattens access details for every recording in every page of the summary', async () => {
    const { adapter, requests } = fakeAdapter([reportServer]);
    const session = new Session({ baseUrl: BASE, token: 'test-token', transport: { adapter } });

    const rows = await buildRecordingReport(session, [{ from: '2024-01-24T23:59:59', to: '2024-01-31T12:00:00' }]);

    expect(rows).toEqual([
      {
        recordingId: 'r1',
        topic: 'Weekly sync',
        timeRecorded: '2024-01-29T10:00:00Z',
        requestorName: 'Dana',
        requestorEmail: 'dana@x.com',
        accessTime: '2024-01-30T09:00:00Z',
        downloaded: false,
        viewed: true,
      },
    ]);
    expect(requests.map(r => r.url)).toEqual([SUMMARY, `${SUMMARY}?page=2`, DETAIL, DETAIL]);
    expect(requests[0].params).toEqual({ hostEmail: 'all', from: '2024-01-24T23:59:59', to: '2024-01-31T12:00:00' });
    expect(requests[3].params).toEqual({ recordingId: 'r2' });
  });
});

describe('validateReportArgs', () => {
  it('accepts the documented limits', () => {
    expect(() => validateReportArgs({ period: 365, span: 90 })).not.toThrow();
  });

  it('rejects periods and spans outside them', () => {
    expect(() => validateReportArgs({ period: 366, span: 7 })).toThrow(ConfigurationError);
    expect(() => validateReportArgs({ period: 90, span: 91 })).toThrow(ConfigurationError);
    expect(() => validateReportArgs({ period: 0, span: 7 })).toThrow(ConfigurationError);
  });
});

describe('recordingReportMain', () => {
  it('queries each window and writes the rows to CSV', async () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), 'webex-admin-recordings-'));
    const { adapter, requests } = fakeAdapter([reportServer]);

    try {
      const rows = await recordingReportMain(
        { period: 10, span: 7, write: path.join(dir, 'recordings') },
        {
          config: { token: 'test-token', baseUrl: BASE, identityUrl: BASE, maxRetries: 0, timeoutMs: 1000 },
          logger: pino({ level: 'silent' }),
          ask: jest.fn(),
          askSecret: jest.fn(),
          now: () => new Date(2024, 0, 31, 12, 0, 0),
          transport: { adapter },
        },
      );

      expect(rows).toHaveLength(2);
      expect(requests.filter(r => r.url === SUMMARY).map(r => r.params)).toEqual([
        { hostEmail: 'all', from: '2024-01-24T23:59:59', to: '2024-01-31T12:00:00' },
        { hostEmail: 'all', from: '2024-01-21T23:59:59', to: '2024-01-24T12:00:00' },
      ]);
      expect(readFileSync(path.join(dir, 'recordings.csv'), 'utf-8')).toBe(
        'recordingId,topic,timeRecorded,requestorName,requestorEmail,accessTime,downloaded,viewed\n'
          + 'r1,Weekly sync,2024-01-29T10:00:00Z,Dana,dana@x.com,2024-01-30T09:00:00Z,false,true\n'
          + 'r1,Weekly sync,2024-01-29T10:00:00Z,Dana,dana@x.com,2024-01-30T09:00:00Z,false,true\n',
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
