import { describe, it, expect } from '@jest/globals';
import { ZodError, z } from 'zod';
import {
  AvailDocumentError,
  AvailValidationError,
  describeViolation,
  toErrorBody,
  type AvailRuleViolation,
} from '../../src/infra/error.js';

describe('describeViolation', () => {
  it.each<[AvailRuleViolation, string]>([
    [{ code: 'InvalidLanguage', languageCode: 'it', allowed: ['en'] }, 'Invalid language code: it'],
    [
      { code: 'MissingCredential', missing: ['password'] },
      'Missing required parameters: password, username, or CompanyID.',
    ],
    [
      { code: 'InvalidSearchType', searchType: undefined },
      "Invalid SearchType: missing. Expected 'Single' or 'Multiple'.",
    ],
    [
      { code: 'DestinationCountViolation', searchType: 'Single', count: 3, limit: 1 },
      "If SearchType is 'Single', there must be exactly one destination.",
    ],
    [
      { code: 'DestinationCountViolation', searchType: 'Multiple', count: 11, limit: 10 },
      "If SearchType is 'Multiple', there can be a maximum of 10 destinations.",
    ],
    [{ code: 'InvalidDate', field: 'endDate', value: undefined }, 'Missing EndDate.'],
    [
      { code: 'InvalidDate', field: 'startDate', value: '2025-03-20' },
      'Invalid StartDate: "2025-03-20". Expected format DD/MM/YYYY.',
    ],
    [
      { code: 'StartDateTooSoon', startDate: '12/03/2025', leadDays: 2 },
      'Start date must be at least 2 days after today.',
    ],
    [{ code: 'StayTooShort', nights: 2, minNights: 3 }, 'Stay duration must be at least 3 nights.'],
    [{ code: 'InvalidOptionsQuota', value: 'abc' }, 'Invalid OptionsQuota: "abc". Expected a non-negative integer.'],
    [{ code: 'QuotaExceeded', optionsQuota: 51, limit: 50 }, 'OptionsQuota must be no greater than 50.'],
    [{ code: 'MissingRooms' }, 'At least one room (Paxes) is required.'],
    [{ code: 'RoomCountExceeded', count: 6, limit: 5 }, 'Number of rooms cannot exceed 5.'],
    [{ code: 'InvalidOccupantAge', roomIndex: 0, value: 'ten' }, 'Invalid pax age "ten" in room 1.'],
    [
      { code: 'RoomCapacityExceeded', roomIndex: 1, occupants: 6, limit: 5 },
      'Number of passengers in a room cannot exceed 5.',
    ],
    [
      { code: 'UnaccompaniedChild', roomIndex: 2, children: 1 },
      'Room 3 has children but no accompanying adult.',
    ],
  ])('renders %j', (violation, message) => {
    expect(describeViolation(violation)).toBe(message);
  });
});

describe('AvailValidationError', () => {
  it('carries the violation and its rendered message', () => {
    const err = new AvailValidationError({ code: 'QuotaExceeded', optionsQuota: 60, limit: 50 });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('AvailValidationError');
    expect(err.code).toBe('QuotaExceeded');
    expect(err.violation).toEqual({ code: 'QuotaExceeded', optionsQuota: 60, limit: 50 });
    expect(err.message).toBe('OptionsQuota must be no greater than 50.');
  });
});

describe('toErrorBody', () => {
  it('wraps the message in an error field', () => {
    expect(toErrorBody({ code: 'MissingRooms' })).toEqual({ error: 'At least one room (Paxes) is required.' });
  });
});

describe('AvailDocumentError.fromZod', () => {
  it('lists each issue with its path', () => {
    const result = z.object({ rooms: z.array(z.string()) }).safeParse({ rooms: [1] });
    if (result.success) throw new Error('expected a schema failure');

    const err = AvailDocumentError.fromZod(result.error);
    expect(result.error).toBeInstanceOf(ZodError);
    expect(err.name).toBe('AvailDocumentError');
    expect(err.issues).toEqual(['rooms.0: Expected string, received number']);
  });
});
