/**
 * Swiss QR-bill payload codec (version 0200, coding type 1).
 *
 * The payload is a fixed sequence of lines: header, creditor account and
 * address, an always-empty ultimate creditor block, amount, debtor,
 * reference, message, the EPD trailer, then optional bill information and
 * alternative schemes.
 */

import { InvalidPayloadError, formatZodError } from "../../errors";
import { BillSchema, type Address, type Bill } from "../../schemas/bill";

const QR_TYPE = "SPC";
const VERSION = "0200";
const CODING_TYPE = "1";
const TRAILER = "EPD";
const SEPARATOR = "\r\n";

const ADDRESS_LINES = 7;
const EMPTY_ADDRESS: readonly string[] = Array.from({ length: ADDRESS_LINES }, () => "");

// Line offsets in the payload.
const ACCOUNT = 3;
const CREDITOR = 4;
const AMOUNT = 18;
const CURRENCY = 19;
const DEBTOR = 20;
const REFERENCE_TYPE = 27;
const REFERENCE = 28;
const MESSAGE = 29;
const TRAILER_LINE = 30;
const BILL_INFORMATION = 31;
const ALTERNATIVE_SCHEMES = 32;

function addressLines(address: Address): string[] {
  return [
    "S",
    address.name,
    address.street ?? "",
    address.buildingNumber ?? "",
    address.postalCode,
    address.town,
    address.country,
  ];
}

export function encodeBill(bill: Bill): string {
  const lines = [
    QR_TYPE,
    VERSION,
    CODING_TYPE,
    bill.account,
    ...addressLines(bill.creditor),
    ...EMPTY_ADDRESS,
    bill.amount === undefined ? "" : bill.amount.toFixed(2),
    bill.currency,
    ...(bill.debtor === undefined ? EMPTY_ADDRESS : addressLines(bill.debtor)),
    bill.referenceType,
    bill.reference ?? "",
    bill.unstructuredMessage ?? "",
    TRAILER,
  ];

  const alternatives = bill.alternativeSchemes ?? [];
  if (bill.billInformation !== undefined || alternatives.length > 0) {
    lines.push(bill.billInformation ?? "", ...alternatives);
  }

  return lines.join(SEPARATOR);
}

function optional(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Structured (S) addresses map field by field. Combined (K) addresses carry
 * two free lines; the second one is split into postal code and town.
 */
function readAddress(lines: readonly string[], offset: number): Record<string, unknown> | undefined {
  const fields: (string | undefined)[] = lines.slice(offset, offset + ADDRESS_LINES);
  const [type, name, line1, line2, postalCode, town, country] = fields;

  switch (type) {
    case "S":
      return {
        name,
        street: optional(line1),
        buildingNumber: optional(line2),
        postalCode,
        town,
        country,
      };
    case "K": {
      const match = /^(\S+)\s+(.+)$/.exec(line2 ?? "");
      return {
        name,
        street: optional(line1),
        postalCode: match?.[1] ?? "",
        town: match?.[2] ?? "",
        country,
      };
    }
    case "":
    case undefined:
      return undefined;
    default:
      throw new InvalidPayloadError(`Unknown address type "${type}"`);
  }
}

export function decodeBill(text: string): Bill {
  const lines = text.split(/\r?\n/);

  if (lines[0] !== QR_TYPE) {
    throw new InvalidPayloadError("Not a Swiss QR-bill payload");
  }
  if (!lines[1]?.startsWith("02")) {
    throw new InvalidPayloadError(`Unsupported Swiss QR-bill version "${lines[1] ?? ""}"`);
  }
  if (lines[2] !== CODING_TYPE) {
    throw new InvalidPayloadError(`Unsupported coding type "${lines[2] ?? ""}"`);
  }
  if (lines.length <= TRAILER_LINE || lines[TRAILER_LINE] !== TRAILER) {
    throw new InvalidPayloadError("Swiss QR-bill payload is truncated or lacks the EPD trailer");
  }

  const amountText = lines[AMOUNT];
  const amount = amountText === "" ? undefined : Number(amountText);
  if (amount !== undefined && Number.isNaN(amount)) {
    throw new InvalidPayloadError(`Invalid amount "${amountText}"`);
  }

  const alternativeSchemes = lines.slice(ALTERNATIVE_SCHEMES).filter((line) => line !== "");

  const candidate = {
    account: lines[ACCOUNT],
    creditor: readAddress(lines, CREDITOR),
    amount,
    currency: lines[CURRENCY],
    debtor: readAddress(lines, DEBTOR),
    referenceType: lines[REFERENCE_TYPE],
    reference: optional(lines[REFERENCE]),
    unstructuredMessage: optional(lines[MESSAGE]),
    billInformation: optional(lines[BILL_INFORMATION]),
    alternativeSchemes: alternativeSchemes.length > 0 ? alternativeSchemes : undefined,
  };

  const parsed = BillSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new InvalidPayloadError(`Invalid Swiss QR-bill payload: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
