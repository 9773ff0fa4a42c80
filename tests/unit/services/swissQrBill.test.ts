import { formatZodError, InvalidPayloadError } from "../../../src/errors";
import {
  BillSchema,
  isQrIban,
  isValidCreditorReference,
  isValidIban,
  isValidQrReference,
} from "../../../src/schemas/bill";
import { decodeBill, encodeBill } from "../../../src/services/qr/swissQrBill";
import { sampleBill, sampleBillParsed } from "../../helpers";

const QR_IBAN = "CH6630808001234567890";
const QR_REFERENCE = "000000000000000000001234565";

const creditor = { name: "Example Pottery AG", postalCode: "8001", town: "Zurich", country: "CH" };

describe("bill validation", () => {
  it("should validate IBAN checksums", () => {
    expect(isValidIban("CH5800777000123456789")).toBe(true);
    expect(isValidIban("CH5800777000123456780")).toBe(false);
    expect(isValidIban("DE5800777000123456789")).toBe(false);
  });

  it("should recognise QR-IBANs by institution id", () => {
    expect(isQrIban(QR_IBAN)).toBe(true);
    expect(isQrIban("CH5800777000123456789")).toBe(false);
  });

  it("should check the QR reference check digit", () => {
    expect(isValidQrReference(QR_REFERENCE)).toBe(true);
    expect(isValidQrReference("000000000000000000001234566")).toBe(false);
    expect(isValidQrReference("12345")).toBe(false);
  });

  it("should check creditor references", () => {
    expect(isValidCreditorReference("RF27INVOICE2026")).toBe(true);
    expect(isValidCreditorReference("RF28INVOICE2026")).toBe(false);
  });

  it("should normalize the account and apply defaults", () => {
    const bill = BillSchema.parse({ account: "ch58 0077 7000 1234 5678 9", creditor });

    expect(bill.account).toBe("CH5800777000123456789");
    expect(bill.currency).toBe("CHF");
    expect(bill.referenceType).toBe("NON");
  });

  it("should reject an account with a bad checksum", () => {
    const result = BillSchema.safeParse({ account: "CH5800777000123456780", creditor });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual(["Account must be a valid CH or LI IBAN"]);
    }
  });

  it("should require a QR-IBAN for QRR references", () => {
    const result = BillSchema.safeParse({
      account: "CH5800777000123456789",
      creditor,
      referenceType: "QRR",
      reference: QR_REFERENCE,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual(["QRR references require a QR-IBAN"]);
    }
  });

  it("should require a QRR reference for a QR-IBAN", () => {
    const result = BillSchema.safeParse({ account: QR_IBAN, creditor });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual(["QR-IBANs require a QRR reference"]);
    }
  });

  it("should reject a reference on a NON bill", () => {
    const result = BillSchema.safeParse({ account: "CH5800777000123456789", creditor, reference: "RF27INVOICE2026" });

    expect(result.success).toBe(false);
  });

  it("should accept a QRR bill on a QR-IBAN", () => {
    const result = BillSchema.safeParse({ account: QR_IBAN, creditor, referenceType: "QRR", reference: QR_REFERENCE });

    expect(result.success).toBe(true);
  });

  it("should cap message and bill information at 140 characters together", () => {
    const result = BillSchema.safeParse({
      account: "CH5800777000123456789",
      creditor,
      unstructuredMessage: "m".repeat(100),
      billInformation: "b".repeat(41),
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Message and bill information together must not exceed 140 characters");
    }
  });

  it("should reject a message spanning several lines", () => {
    const result = BillSchema.safeParse({ account: "CH5800777000123456789", creditor, unstructuredMessage: "Order\n42" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => [issue.path.join("."), issue.message])).toEqual([
        ["unstructuredMessage", "Must be a single line"],
      ]);
    }
  });

  it("should reject line breaks inside address fields", () => {
    const result = BillSchema.safeParse({
      account: "CH5800777000123456789",
      creditor: { ...creditor, name: "A\r\nB" },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe("creditor.name: Must be a single line");
    }
  });

  it("should reject line breaks in alternative schemes", () => {
    const result = BillSchema.safeParse({
      account: "CH5800777000123456789",
      creditor,
      alternativeSchemes: ["eBill/B/one", "two\rlines"],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe("alternativeSchemes.1: Must be a single line");
    }
  });
});

describe("encodeBill", () => {
  it("should lay out the payload line by line", () => {
    const payload = encodeBill(BillSchema.parse(sampleBill));

    expect(payload.split("\r\n")).toEqual([
      "SPC",
      "0200",
      "1",
      "CH5800777000123456789",
      "S",
      "Example Pottery AG",
      "Bahnhofstrasse",
      "1",
      "8001",
      "Zurich",
      "CH",
      "",
      "",
      "",
      "",
      "",
      "",
      "",
      "150.50",
      "CHF",
      "S",
      "Jane Placeholder",
      "",
      "",
      "3000",
      "Bern",
      "CH",
      "SCOR",
      "RF27INVOICE2026",
      "Order 42",
      "EPD",
    ]);
  });

  it("should leave amount and debtor blank when absent", () => {
    const lines = encodeBill(BillSchema.parse({ account: "CH5800777000123456789", creditor })).split("\r\n");

    expect(lines[18]).toBe("");
    expect(lines.slice(20, 27)).toEqual(["", "", "", "", "", "", ""]);
    expect(lines.slice(27)).toEqual(["NON", "", "", "EPD"]);
  });

  it("should append bill information and alternative schemes after the trailer", () => {
    const lines = encodeBill(
      BillSchema.parse({
        account: "CH5800777000123456789",
        creditor,
        billInformation: "//S1/10/10201409",
        alternativeSchemes: ["eBill/B/placeholder@example.com"],
      })
    ).split("\r\n");

    expect(lines.slice(30)).toEqual(["EPD", "//S1/10/10201409", "eBill/B/placeholder@example.com"]);
  });
});

describe("decodeBill", () => {
  it("should read back an encoded bill", () => {
    expect(decodeBill(encodeBill(BillSchema.parse(sampleBill)))).toEqual(sampleBillParsed);
  });

  it("should accept LF line endings", () => {
    const payload = encodeBill(BillSchema.parse(sampleBill)).split("\r\n").join("\n");

    expect(decodeBill(payload)).toEqual(sampleBillParsed);
  });

  it("should split combined addresses into postal code and town", () => {
    const lines = encodeBill(BillSchema.parse({ account: "CH5800777000123456789", creditor })).split("\r\n");
    lines.splice(4, 7, "K", "Example Pottery AG", "Bahnhofstrasse 1", "8001 Zurich", "", "", "CH");

    expect(decodeBill(lines.join("\r\n")).creditor).toEqual({
      name: "Example Pottery AG",
      street: "Bahnhofstrasse 1",
      postalCode: "8001",
      town: "Zurich",
      country: "CH",
    });
  });

  it("should reject text that is not a QR-bill", () => {
    expect(() => decodeBill("hello world")).toThrow(new InvalidPayloadError("Not a Swiss QR-bill payload"));
  });

  it("should reject an unsupported version", () => {
    expect(() => decodeBill("SPC\r\n0100\r\n1")).toThrow('Unsupported Swiss QR-bill version "0100"');
  });

  it("should reject a payload without the trailer", () => {
    const truncated = encodeBill(BillSchema.parse(sampleBill)).split("\r\n").slice(0, 30).join("\r\n");

    expect(() => decodeBill(truncated)).toThrow("Swiss QR-bill payload is truncated or lacks the EPD trailer");
  });

  it("should report validation failures of the decoded bill", () => {
    const lines = encodeBill(BillSchema.parse(sampleBill)).split("\r\n");
    lines[3] = "CH5800777000123456780";

    expect(() => decodeBill(lines.join("\r\n"))).toThrow(
      "Invalid Swiss QR-bill payload: account: Account must be a valid CH or LI IBAN"
    );
  });
});
