import assert from "node:assert/strict";
import test from "node:test";

import { describeOriginPolicy, isOriginAllowed, normalizeOrigin } from "../src/origin-policy";

test("origin: any accepts every origin", () => {
  assert.equal(isOriginAllowed("any", { origin: "http://evil.example", host: "localhost:8080" }), true);
});

test("origin: same-origin compares the origin host with the Host header", () => {
  assert.equal(
    isOriginAllowed("same-origin", { origin: "http://localhost:8080", host: "localhost:8080" }),
    true
  );
  assert.equal(
    isOriginAllowed("same-origin", { origin: "http://LOCALHOST:8080", host: "localhost:8080" }),
    true
  );
  assert.equal(
    isOriginAllowed("same-origin", { origin: "http://other.example:8080", host: "localhost:8080" }),
    false
  );
  assert.equal(isOriginAllowed("same-origin", { origin: "null", host: "localhost:8080" }), false);
  assert.equal(isOriginAllowed("same-origin", { origin: "http://localhost:8080" }), false);
});

test("origin: requests without an Origin header pass every policy", () => {
  assert.equal(isOriginAllowed("same-origin", { host: "localhost:8080" }), true);
  assert.equal(isOriginAllowed([], { host: "localhost:8080" }), true);
  assert.equal(isOriginAllowed(["https://app.example.com"], {}), true);
});

test("origin: allow-list matches normalized origins", () => {
  const policy = ["https://app.example.com/"];
  assert.equal(isOriginAllowed(policy, { origin: "HTTPS://APP.EXAMPLE.COM" }), true);
  assert.equal(isOriginAllowed(policy, { origin: "https://evil.example.com" }), false);
  assert.equal(isOriginAllowed([], { origin: "https://app.example.com" }), false);
  assert.equal(normalizeOrigin(" https://a.example// "), "https://a.example");
});

test("origin: describes each policy for the startup banner", () => {
  assert.equal(describeOriginPolicy("any"), "any origin (development mode)");
  assert.equal(describeOriginPolicy("same-origin"), "same origin only");
  assert.equal(describeOriginPolicy([]), "no browser origins");
  assert.equal(describeOriginPolicy(["https://a.example", "https://b.example"]), "https://a.example, https://b.example");
});
