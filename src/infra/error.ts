import { ZodError } from "zod";

export type CredentialField = "username" | "password" | "companyId";
export type DateField = "startDate" | "endDate";

/**
 * Closed set of business-rule violations. Every variant carries the offending
 * value and, where one applies, the configured limit.
 */
export type AvailRuleViolation =
  | { code: "InvalidLanguage"; languageCode: string; allowed: string[] }
  | { code: "MissingCredential"; missing: CredentialField[] }
  | { code: "InvalidSearchType"; searchType: string | undefined }
  | { code: "DestinationCountViolation"; searchType: "Single" | "Multiple"; count: number; limit: number }
  | { code: "InvalidDate"; field: DateField; value: string | undefined }
  | { code: "StartDateTooSoon"; startDate: string; leadDays: number }
  | { code: "StayTooShort"; nights: number; minNights: number }
  | { code: "InvalidOptionsQuota"; value: string }
  | { code: "QuotaExceeded"; optionsQuota: number; limit: number }
  | { code: "MissingRooms" }
  | { code: "RoomCountExceeded"; count: number; limit: number }
  | { code: "InvalidOccupantAge"; roomIndex: number; value: string }
  | { code: "RoomCapacityExceeded"; roomIndex: number; occupants: number; limit: number }
  | { code: "UnaccompaniedChild"; roomIndex: number; children: number };

export type AvailRuleCode = AvailRuleViolation["code"];

const DATE_FIELD_TAG: Record<DateField, string> = {
  startDate: "StartDate",
  endDate: "EndDate",
};

/**
 * Human-readable rendering of a violation. This is the text surfaced as the
 * `error` field of the response.
 */
export function describeViolation(v: AvailRuleViolation): string {
  switch (v.code) {
    case "InvalidLanguage":
      return `Invalid language code: ${v.languageCode}`;
    case "MissingCredential":
      return "Missing required parameters: password, username, or CompanyID.";
    case "InvalidSearchType":
      return `Invalid SearchType: ${v.searchType ?? "missing"}. Expected 'Single' or 'Multiple'.`;
    case "DestinationCountViolation":
      return v.searchType === "Single"
        ? "If SearchType is 'Single', there must be exactly one destination."
        : `If SearchType is 'Multiple', there can be a maximum of ${v.limit} destinations.`;
    case "InvalidDate":
      return v.value === undefined
        ? `Missing ${DATE_FIELD_TAG[v.field]}.`
        : `Invalid ${DATE_FIELD_TAG[v.field]}: "${v.value}". Expected format DD/MM/YYYY.`;
    case "StartDateTooSoon":
      return `Start date must be at least ${v.leadDays} days after today.`;
    case "StayTooShort":
      return `Stay duration must be at least ${v.minNights} nights.`;
    case "InvalidOptionsQuota":
      return `Invalid OptionsQuota: "${v.value}". Expected a non-negative integer.`;
    case "QuotaExceeded":
      return `OptionsQuota must be no greater than ${v.limit}.`;
    case "MissingRooms":
      return "At least one room (Paxes) is required.";
    case "RoomCountExceeded":
      return `Number of rooms cannot exceed ${v.limit}.`;
    case "InvalidOccupantAge":
      return `Invalid pax age "${v.value}" in room ${v.roomIndex + 1}.`;
    case "RoomCapacityExceeded":
      return `Number of passengers in a room cannot exceed ${v.limit}.`;
    case "UnaccompaniedChild":
      return `Room ${v.roomIndex + 1} has children but no accompanying adult.`;
  }
}

export class AvailValidationError extends Error {
  public readonly violation: AvailRuleViolation;

  constructor(violation: AvailRuleViolation) {
    super(describeViolation(violation));
    this.name = "AvailValidationError";
    this.violation = violation;
    Error.captureStackTrace(this, this.constructor);
  }

  get code(): AvailRuleCode {
    return this.violation.code;
  }
}

/**
 * The request document itself could not be read: bad XML or JSON syntax,
 * wrong root element, or a shape that does not match the request schema.
 */
export class AvailDocumentError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "AvailDocumentError";
    this.issues = issues;
    Error.captureStackTrace(this, this.constructor);
  }

  public static fromZod(err: ZodError): AvailDocumentError {
    const issues = err.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    return new AvailDocumentError("Request document does not match the AvailRQ schema", issues);
  }
}

export interface ErrorBody {
  error: string;
}

export function toErrorBody(violation: AvailRuleViolation): ErrorBody {
  return { error: describeViolation(violation) };
}
