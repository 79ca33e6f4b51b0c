import { create } from 'xmlbuilder2';
import { logger } from '../infra/logger.js';

export interface AvailRequestInput {
  timeoutMilliseconds?: number;
  languageCode?: string;
  optionsQuota?: number;
  credentials?: {
    username?: string;
    password?: string;
    companyId?: string;
  };
  searchType?: string;
  destinations: Array<{ code?: string }>;
  startDate?: string; // DD/MM/YYYY
  endDate?: string; // DD/MM/YYYY
  currency?: string;
  nationality?: string;
  market?: string;
  // One entry per room; undefined leaves the Pax age attribute off
  rooms: Array<Array<number | undefined>>;
}

/**
 * Builds an AvailRQ XML document from plain fields.
 * Optional fields are left out entirely when not given.
 */
export function buildAvailRequestXml(input: AvailRequestInput): string {
  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('AvailRQ', {
      'xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
      'xmlns:xsd': 'http://www.w3.org/2001/XMLSchema'
    });

  if (input.timeoutMilliseconds !== undefined) {
    root.ele('timeoutMilliseconds').txt(String(input.timeoutMilliseconds));
  }
  if (input.languageCode !== undefined) {
    root.ele('source').ele('languageCode').txt(input.languageCode);
  }
  if (input.optionsQuota !== undefined) {
    root.ele('optionsQuota').txt(String(input.optionsQuota));
  }

  // Configuration/Parameters/Parameter carries the credentials as attributes
  if (input.credentials) {
    const { username, password, companyId } = input.credentials;
    root.ele('Configuration').ele('Parameters').ele('Parameter', {
      ...(password !== undefined && { password }),
      ...(username !== undefined && { username }),
      ...(companyId !== undefined && { CompanyID: companyId })
    });
  }

  if (input.searchType !== undefined) {
    root.ele('SearchType').txt(input.searchType);
  }
  if (input.startDate !== undefined) {
    root.ele('StartDate').txt(input.startDate);
  }
  if (input.endDate !== undefined) {
    root.ele('EndDate').txt(input.endDate);
  }
  if (input.currency !== undefined) {
    root.ele('Currency').txt(input.currency);
  }
  if (input.nationality !== undefined) {
    root.ele('Nationality').txt(input.nationality);
  }
  if (input.market !== undefined) {
    root.ele('Market').txt(input.market);
  }

  for (const destination of input.destinations) {
    root.ele('AvailDestinations', destination.code !== undefined ? { code: destination.code } : {});
  }

  for (const ages of input.rooms) {
    const paxes = root.ele('Paxes');
    for (const age of ages) {
      paxes.ele('Pax', age !== undefined ? { age: String(age) } : {});
    }
  }

  const xmlString = root.end({ prettyPrint: true });

  logger.debug({
    searchType: input.searchType,
    destinations: input.destinations.length,
    rooms: input.rooms.length
  }, 'Generated AvailRQ XML');

  return xmlString;
}
