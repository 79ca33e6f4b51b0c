import type { Logger } from "pino";
import { v4 as uuid } from "uuid";
import { config, rulesFromServiceConfig, type AvailRules } from "../infra/config.js";
import { logger as rootLogger } from "../infra/logger.js";
import { AvailValidationError, toErrorBody, type AvailRuleViolation } from "../infra/error.js";
import { parseAvailRequestText } from "./availRequestParser.js";
import { validateAvailRequest } from "./availRequestValidator.js";
import { buildAvailResponse, renderAvailResponse } from "./availResponseBuilder.js";
import type { AvailRequestDocument, PricedOffer, ValidatedAvailRequest } from "./availTypes.js";

export interface AvailPipelineOptions {
  rules?: AvailRules;
  now?: Date;
  logger?: Logger;
  requestId?: string;
}

export type AvailResult =
  | { ok: true; request: ValidatedAvailRequest; offers: PricedOffer[] }
  | { ok: false; violation: AvailRuleViolation };

const processRules = rulesFromServiceConfig(config);

/**
 * Validate a parsed request and price it. Rule violations come back as
 * `ok: false`; any other error propagates.
 */
export function handleAvailRequest(doc: AvailRequestDocument, options: AvailPipelineOptions = {}): AvailResult {
  const rules = options.rules ?? processRules;
  const log = (options.logger ?? rootLogger).child({ requestId: options.requestId ?? uuid() });

  try {
    const request = validateAvailRequest(doc, rules, options.now ?? new Date());
    const offers = buildAvailResponse(request, rules);
    log.info(
      {
        searchType: request.searchType,
        destinations: request.destinations.length,
        rooms: request.rooms.length,
        offers: offers.length,
      },
      "Availability request priced"
    );
    return { ok: true, request, offers };
  } catch (err) {
    if (err instanceof AvailValidationError) {
      log.warn({ code: err.code, violation: err.violation }, "Availability request rejected");
      return { ok: false, violation: err.violation };
    }
    throw err;
  }
}

/**
 * Document text in, response JSON out. The text may be XML or JSON.
 * A malformed document throws AvailDocumentError instead of producing an
 * `error` body.
 */
export function processAvailRequest(text: string, options: AvailPipelineOptions = {}): string {
  const doc = parseAvailRequestText(text);
  const result = handleAvailRequest(doc, options);
  if (result.ok) {
    return renderAvailResponse(result.offers);
  }
  return JSON.stringify(toErrorBody(result.violation));
}
