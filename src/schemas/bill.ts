import { z } from "zod";

const MOD10_TABLE = [0, 9, 4, 6, 8, 2, 7, 1, 3, 5];

/** ISO 7064 mod 97-10, shared by IBANs and creditor references (ISO 11649). */
export function mod97(value: string): number {
  const rearranged = value.slice(4) + value.slice(0, 4);
  let remainder = 0;
  for (const char of rearranged) {
    const digits = parseInt(char, 36).toString();
    for (const digit of digits) {
      remainder = (remainder * 10 + Number(digit)) % 97;
    }
  }
  return remainder;
}

export function isValidIban(iban: string): boolean {
  return /^(CH|LI)\d{7}[0-9A-Z]{12}$/.test(iban) && mod97(iban) === 1;
}

/** QR-IBANs carry an institution id between 30000 and 31999. */
export function isQrIban(iban: string): boolean {
  const iid = Number(iban.slice(4, 9));
  return iid >= 30000 && iid <= 31999;
}

/** 27 digits, the last one a recursive mod 10 check digit. */
export function isValidQrReference(reference: string): boolean {
  if (!/^\d{27}$/.test(reference)) {
    return false;
  }
  let carry = 0;
  for (const digit of reference.slice(0, 26)) {
    carry = MOD10_TABLE[(carry + Number(digit)) % 10];
  }
  return (10 - carry) % 10 === Number(reference[26]);
}

export function isValidCreditorReference(reference: string): boolean {
  return /^RF\d{2}[0-9A-Z]{1,21}$/.test(reference) && mod97(reference) === 1;
}

const compact = (value: string) => value.replace(/\s+/g, "").toUpperCase();

/** Payload fields are separated by line breaks, so none may contain one. */
const SINGLE_LINE = /^[^\r\n]*$/;
const line = (max: number) => z.string().max(max).regex(SINGLE_LINE, "Must be a single line");
const trimmedLine = (min: number, max: number) =>
  z.string().trim().min(min).max(max).regex(SINGLE_LINE, "Must be a single line");

export const AddressSchema = z.object({
  name: trimmedLine(1, 70),
  street: trimmedLine(0, 70).optional(),
  buildingNumber: trimmedLine(0, 16).optional(),
  postalCode: trimmedLine(1, 16),
  town: trimmedLine(1, 35),
  country: z.string().regex(/^[A-Z]{2}$/, "Country must be an ISO 3166 alpha-2 code"),
});

export const CURRENCIES = ["CHF", "EUR"] as const;
export const REFERENCE_TYPES = ["QRR", "SCOR", "NON"] as const;

export const BillSchema = z
  .object({
    account: z
      .string()
      .transform(compact)
      .refine(isValidIban, "Account must be a valid CH or LI IBAN"),
    creditor: AddressSchema,
    amount: z
      .number()
      .min(0.01, "Amount must be at least 0.01")
      .max(999999999.99, "Amount exceeds maximum")
      .optional(),
    currency: z.enum(CURRENCIES).default("CHF"),
    debtor: AddressSchema.optional(),
    referenceType: z.enum(REFERENCE_TYPES).default("NON"),
    reference: z.string().transform(compact).optional(),
    unstructuredMessage: line(140).optional(),
    billInformation: line(140).optional(),
    alternativeSchemes: z.array(line(100)).max(2).optional(),
  })
  .superRefine((bill, ctx) => {
    const qrIban = isQrIban(bill.account);

    switch (bill.referenceType) {
      case "QRR":
        if (!qrIban) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["account"], message: "QRR references require a QR-IBAN" });
        }
        if (bill.reference === undefined || !isValidQrReference(bill.reference)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["reference"], message: "Invalid QR reference" });
        }
        break;
      case "SCOR":
        if (qrIban) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["account"], message: "QR-IBANs require a QRR reference" });
        }
        if (bill.reference === undefined || !isValidCreditorReference(bill.reference)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["reference"], message: "Invalid creditor reference" });
        }
        break;
      case "NON":
        if (qrIban) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["account"], message: "QR-IBANs require a QRR reference" });
        }
        if (bill.reference !== undefined && bill.reference !== "") {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["reference"], message: "Reference must be empty for type NON" });
        }
        break;
    }

    const trailerLength = (bill.unstructuredMessage ?? "").length + (bill.billInformation ?? "").length;
    if (trailerLength > 140) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["billInformation"],
        message: "Message and bill information together must not exceed 140 characters",
      });
    }
  });

export type Address = z.infer<typeof AddressSchema>;
export type Bill = z.infer<typeof BillSchema>;
/** Shape accepted before defaults and normalization. */
export type BillInput = z.input<typeof BillSchema>;

export const ImageOptionsSchema = z.object({
  format: z.enum(["png", "svg"]).default("png"),
  size: z.coerce.number().int().min(100).max(2000).default(500),
});

export type ImageOptions = z.infer<typeof ImageOptionsSchema>;

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

/** Flat query-string form of a bill for the simple GET generator. */
export const SimpleBillQuerySchema = z
  .object({
    account: z.string(),
    creditorName: z.string(),
    creditorStreet: optionalText,
    creditorBuildingNumber: optionalText,
    creditorPostalCode: z.string(),
    creditorTown: z.string(),
    creditorCountry: z.string().default("CH"),
    amount: z.coerce.number().optional(),
    currency: z.string().default("CHF"),
    referenceType: z.string().default("NON"),
    reference: optionalText,
    message: optionalText,
  });

export type SimpleBillQuery = z.infer<typeof SimpleBillQuerySchema>;

export function billFromQuery(query: SimpleBillQuery): unknown {
  return {
    account: query.account,
    creditor: {
      name: query.creditorName,
      street: query.creditorStreet,
      buildingNumber: query.creditorBuildingNumber,
      postalCode: query.creditorPostalCode,
      town: query.creditorTown,
      country: query.creditorCountry,
    },
    amount: query.amount,
    currency: query.currency,
    referenceType: query.referenceType,
    reference: query.reference,
    unstructuredMessage: query.message,
  };
}
