import { describe, expect, it } from "vitest";
import { isMacAddress, normalizeAddress } from "./address";

describe("normalizeAddress", () => {
	it("upper-cases MAC addresses and uses colons", () => {
		expect(normalizeAddress("aa:bb:cc:dd:ee:ff")).toBe("AA:BB:CC:DD:EE:FF");
		expect(normalizeAddress(" aa-bb-cc-dd-ee-ff ")).toBe("AA:BB:CC:DD:EE:FF");
	});

	it("leaves platform identifiers alone", () => {
		expect(normalizeAddress("3f2a9c1e0b7d4e1f")).toBe("3f2a9c1e0b7d4e1f");
		expect(normalizeAddress("C8A1E2F4-5B6D-4E7F-8091-A2B3C4D5E6F7")).toBe(
			"C8A1E2F4-5B6D-4E7F-8091-A2B3C4D5E6F7",
		);
	});
});

describe("isMacAddress", () => {
	it("recognizes MAC addresses only", () => {
		expect(isMacAddress("AA:BB:CC:DD:EE:FF")).toBe(true);
		expect(isMacAddress("aa-bb-cc-dd-ee-ff")).toBe(true);
		expect(isMacAddress("AA:BB:CC:DD:EE")).toBe(false);
		expect(isMacAddress("3f2a9c1e0b7d4e1f")).toBe(false);
	});
});
