import type { AvailRules } from "../infra/config.js";
import { AvailValidationError, type CredentialField } from "../infra/error.js";
import type {
  AvailCredentials,
  AvailRequestDocument,
  AvailRoomDocument,
  Occupant,
  OccupantCategory,
  RoomOccupancy,
  SearchType,
  ValidatedAvailRequest,
} from "./availTypes.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse a DD/MM/YYYY calendar date to UTC midnight.
 * Returns undefined for anything that is not a real day (e.g. 31/02/2025).
 */
export function parseCalendarDate(text: string): Date | undefined {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return undefined;
  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  // setUTCFullYear keeps years 0-99 literal; Date.UTC maps them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

function utcMidnight(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export function classifyOccupant(age: number, rules: AvailRules): OccupantCategory {
  return age <= rules.maxChildAge ? "Child" : "Adult";
}

function resolveLanguage(doc: AvailRequestDocument, rules: AvailRules): string {
  const languageCode = doc.languageCode ?? rules.defaults.languageCode;
  if (!rules.allowedLanguages.has(languageCode)) {
    throw new AvailValidationError({
      code: "InvalidLanguage",
      languageCode,
      allowed: [...rules.allowedLanguages],
    });
  }
  return languageCode;
}

function resolveCredentials(doc: AvailRequestDocument): AvailCredentials {
  const { username, password, companyId } = doc.credentials ?? {};
  if (username && password && companyId) {
    return Object.freeze({ username, password, companyId });
  }
  const missing: CredentialField[] = [];
  if (!username) missing.push("username");
  if (!password) missing.push("password");
  if (!companyId) missing.push("companyId");
  throw new AvailValidationError({ code: "MissingCredential", missing });
}

function resolveSearchType(doc: AvailRequestDocument, rules: AvailRules): SearchType {
  const searchType = doc.searchType;
  if (searchType !== "Single" && searchType !== "Multiple") {
    throw new AvailValidationError({ code: "InvalidSearchType", searchType });
  }

  const count = doc.destinations.length;
  if (searchType === "Single" && count !== 1) {
    throw new AvailValidationError({ code: "DestinationCountViolation", searchType, count, limit: 1 });
  }
  if (searchType === "Multiple" && count > rules.maxDestinations) {
    throw new AvailValidationError({
      code: "DestinationCountViolation",
      searchType,
      count,
      limit: rules.maxDestinations,
    });
  }
  return searchType;
}

function resolveStay(
  doc: AvailRequestDocument,
  rules: AvailRules,
  now: Date
): { stayStart: Date; stayEnd: Date; nights: number } {
  const { startDate, endDate } = doc;
  const stayStart = startDate === undefined ? undefined : parseCalendarDate(startDate);
  if (startDate === undefined || !stayStart) {
    throw new AvailValidationError({ code: "InvalidDate", field: "startDate", value: startDate });
  }
  const stayEnd = endDate === undefined ? undefined : parseCalendarDate(endDate);
  if (!stayEnd) {
    throw new AvailValidationError({ code: "InvalidDate", field: "endDate", value: endDate });
  }

  // Exclusive: a start exactly leadDays after today is still too soon
  const earliest = utcMidnight(now).getTime() + rules.startDateLeadDays * DAY_MS;
  if (stayStart.getTime() <= earliest) {
    throw new AvailValidationError({ code: "StartDateTooSoon", startDate, leadDays: rules.startDateLeadDays });
  }

  const nights = Math.round((stayEnd.getTime() - stayStart.getTime()) / DAY_MS);
  if (nights < rules.minStayNights) {
    throw new AvailValidationError({ code: "StayTooShort", nights, minNights: rules.minStayNights });
  }
  return { stayStart, stayEnd, nights };
}

function resolveOptionsQuota(doc: AvailRequestDocument, rules: AvailRules): number {
  if (doc.optionsQuota === undefined) return rules.defaultOptionsQuota;
  if (!INTEGER_PATTERN.test(doc.optionsQuota)) {
    throw new AvailValidationError({ code: "InvalidOptionsQuota", value: doc.optionsQuota });
  }
  const optionsQuota = parseInt(doc.optionsQuota, 10) || rules.defaultOptionsQuota;
  if (optionsQuota > rules.maxOptionsQuota) {
    throw new AvailValidationError({ code: "QuotaExceeded", optionsQuota, limit: rules.maxOptionsQuota });
  }
  return optionsQuota;
}

// Unknown or absent codes fall back to the default; these fields never fail
function resolveCode(value: string | undefined, allowed: ReadonlySet<string>, fallback: string): string {
  return value !== undefined && allowed.has(value) ? value : fallback;
}

function resolveRoom(room: AvailRoomDocument, roomIndex: number, rules: AvailRules): RoomOccupancy {
  if (room.paxes.length > rules.maxGuestsPerRoom) {
    throw new AvailValidationError({
      code: "RoomCapacityExceeded",
      roomIndex,
      occupants: room.paxes.length,
      limit: rules.maxGuestsPerRoom,
    });
  }

  const occupants: Occupant[] = room.paxes.map((pax) => {
    const raw = pax.age ?? "0";
    if (!INTEGER_PATTERN.test(raw)) {
      throw new AvailValidationError({ code: "InvalidOccupantAge", roomIndex, value: raw });
    }
    const age = parseInt(raw, 10);
    return Object.freeze({ age, category: classifyOccupant(age, rules) });
  });

  const children = occupants.filter((o) => o.category === "Child").length;
  const adults = occupants.length - children;
  if (rules.enforceChildAccompaniment && children > 0 && adults === 0) {
    throw new AvailValidationError({ code: "UnaccompaniedChild", roomIndex, children });
  }
  return Object.freeze({ occupants: Object.freeze(occupants), adults, children });
}

function resolveRooms(doc: AvailRequestDocument, rules: AvailRules): readonly RoomOccupancy[] {
  if (doc.rooms.length === 0) {
    throw new AvailValidationError({ code: "MissingRooms" });
  }
  if (doc.rooms.length > rules.maxRooms) {
    throw new AvailValidationError({ code: "RoomCountExceeded", count: doc.rooms.length, limit: rules.maxRooms });
  }
  return Object.freeze(doc.rooms.map((room, index) => resolveRoom(room, index, rules)));
}

/**
 * Apply the availability business rules in order and return the validated
 * request. The first violated rule is thrown as an AvailValidationError;
 * later rules are not evaluated.
 */
export function validateAvailRequest(
  doc: AvailRequestDocument,
  rules: AvailRules,
  now: Date = new Date()
): ValidatedAvailRequest {
  const languageCode = resolveLanguage(doc, rules);
  const credentials = resolveCredentials(doc);
  const searchType = resolveSearchType(doc, rules);
  const { stayStart, stayEnd, nights } = resolveStay(doc, rules, now);
  const optionsQuota = resolveOptionsQuota(doc, rules);

  const currency = resolveCode(doc.currency, rules.allowedCurrencies, rules.defaults.currency);
  const nationality = resolveCode(doc.nationality, rules.allowedNationalities, rules.defaults.nationality);
  const market = resolveCode(doc.market, rules.allowedMarkets, rules.defaults.market);

  const rooms = resolveRooms(doc, rules);

  // Frozen all the way down
  return Object.freeze({
    timeoutMilliseconds: doc.timeoutMilliseconds,
    languageCode,
    optionsQuota,
    credentials,
    searchType,
    destinations: Object.freeze(doc.destinations.map((d) => Object.freeze({ ...d }))),
    stayStart,
    stayEnd,
    nights,
    currency,
    nationality,
    market,
    rooms,
  });
}
