import assert from "node:assert/strict";
import test from "node:test";

import { SBI_MESSAGE, rules } from "./helpers";
import { IntelligenceExtractor, countHighValue, populatedHighValueFields, uniqueMerge } from "../core/extractor";
import { LlmClient } from "../core/llm";
import { emptyIntelligence } from "../utils/types";

function extractorWith(answer?: () => Promise<string>) {
  let calls = 0;
  const llm = answer
    ? new LlmClient(
        [
          {
            name: "fake",
            complete: () => {
              calls += 1;
              return answer();
            }
          }
        ],
        100
      )
    : null;
  const extractor = new IntelligenceExtractor({ rules, sufficiencyThreshold: 1, llm });
  return { extractor, calls: () => calls };
}

test("primary pass pulls every field out of the bank scam message", () => {
  const { extractor } = extractorWith();
  assert.deepEqual(extractor.extractPrimary(SBI_MESSAGE), {
    bankAccounts: [],
    upiIds: ["verify-bank@upi"],
    phishingLinks: ["http://sbi-secure-kyc.com"],
    phoneNumbers: ["9876543210"],
    suspiciousKeywords: ["verify", "blocked", "account", "kyc", "bank", "upi"]
  });
});

test("bank accounts need account context and must not look like a phone", () => {
  const { extractor } = extractorWith();
  const intel = extractor.extractPrimary("Transfer to account number 123456789012 IFSC SBIN0001234");
  assert.deepEqual(intel.bankAccounts, ["123456789012"]);
  assert.deepEqual(intel.phoneNumbers, []);

  assert.deepEqual(extractor.extractPrimary("order id 123456789012 shipped").bankAccounts, []);
  assert.deepEqual(extractor.extractPrimary("account 9876543210").bankAccounts, []);
});

test("phone numbers drop the country code", () => {
  const { extractor } = extractorWith();
  assert.deepEqual(extractor.extractPrimary("call +91-9876543210 today").phoneNumbers, ["9876543210"]);
  assert.deepEqual(extractor.extractPrimary("call 1234567890").phoneNumbers, []);
});

test("links lose trailing punctuation and email addresses are not UPI ids", () => {
  const { extractor } = extractorWith();
  const intel = extractor.extractPrimary("open www.paytm-refund.in/claim?id=7, or mail help@gmail.com");
  assert.deepEqual(intel.phishingLinks, ["www.paytm-refund.in/claim?id=7"]);
  assert.deepEqual(intel.upiIds, []);
});

test("merging the same message twice does not grow any set", async () => {
  const { extractor } = extractorWith();
  const once = await extractor.extract(SBI_MESSAGE, emptyIntelligence());
  const twice = await extractor.extract(SBI_MESSAGE, once);
  assert.deepEqual(twice, once);
});

test("uniqueMerge keeps first spelling and drops case duplicates", () => {
  assert.deepEqual(uniqueMerge(["A@ybl"], ["a@ybl ", "b@ybl", ""]), ["A@ybl", "b@ybl"]);
});

test("high value counters ignore keywords", () => {
  const intel = emptyIntelligence();
  intel.suspiciousKeywords.push("otp");
  intel.upiIds.push("a@ybl", "b@ybl");
  assert.equal(countHighValue(intel), 2);
  assert.equal(populatedHighValueFields(intel), 1);
});

test("secondary pass runs only when the primary pass is insufficient", async () => {
  const { extractor, calls } = extractorWith(async () => "{}");
  await extractor.extract(SBI_MESSAGE, emptyIntelligence());
  assert.equal(calls(), 0);
  await extractor.extract("send the money to my id, details below", emptyIntelligence());
  assert.equal(calls(), 1);
});

test("secondary candidates that fail validation are discarded", async () => {
  const { extractor } = extractorWith(async () =>
    JSON.stringify({
      upiIds: ["scam.pay@okaxis", "not-an-id"],
      phoneNumbers: ["9123456789", "+91 9988776655"],
      phishingLinks: ["not a link"],
      bankAccounts: ["55556666777788"]
    })
  );
  const intel = await extractor.extract(
    "send the money to my id, my other number is 99887 76655",
    emptyIntelligence()
  );
  assert.deepEqual(intel.upiIds, ["scam.pay@okaxis"]);
  assert.deepEqual(intel.phoneNumbers, ["9988776655"]);
  assert.deepEqual(intel.phishingLinks, []);
  assert.deepEqual(intel.bankAccounts, []);
});

test("a failing model leaves the primary result untouched", async () => {
  const { extractor } = extractorWith(async () => {
    throw new Error("timeout");
  });
  const intel = await extractor.extract("hello, urgent payment", emptyIntelligence());
  assert.deepEqual(intel, { ...emptyIntelligence(), suspiciousKeywords: ["urgent", "payment"] });
});

test("model-proposed bank accounts need the same account context as the primary pass", async () => {
  const { extractor, calls } = extractorWith(async () => JSON.stringify({ bankAccounts: ["123456789012"] }));
  const intel = await extractor.extract("your order id 123456789012 has shipped", emptyIntelligence());
  assert.equal(calls(), 1);
  assert.deepEqual(intel.bankAccounts, []);

  assert.equal(extractor.patterns.validate("bankAccounts", "1234-5678-9012", "deposit to 123456789012"), "123456789012");
  assert.equal(extractor.patterns.validate("bankAccounts", "123456789012", "tracking 123456789012"), null);
});
