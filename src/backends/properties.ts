import type { CharacteristicProperties } from "../types";

export const NO_PROPERTIES: Readonly<CharacteristicProperties> = {
	broadcast: false,
	read: false,
	writeWithoutResponse: false,
	write: false,
	notify: false,
	indicate: false,
	authenticatedSignedWrites: false,
	reliableWrite: false,
	writableAuxiliaries: false,
};

const PROPERTY_NAMES: readonly (keyof CharacteristicProperties)[] = [
	"broadcast",
	"read",
	"writeWithoutResponse",
	"write",
	"notify",
	"indicate",
	"authenticatedSignedWrites",
	"reliableWrite",
	"writableAuxiliaries",
];

const PROPERTY_BY_FLAG = new Map(
	PROPERTY_NAMES.map((property) => [property.toLowerCase(), property] as const),
);

/**
 * Builds a property set from the flag names a native stack reports.
 * Accepts noble's camelCase (`writeWithoutResponse`) and BlueZ's kebab-case
 * (`write-without-response`); unknown flags such as `encrypt-read` are
 * ignored.
 */
export function propertiesFromFlags(flags: readonly string[]): CharacteristicProperties {
	const properties = { ...NO_PROPERTIES };
	for (const flag of flags) {
		const property = PROPERTY_BY_FLAG.get(flag.replace(/-/g, "").toLowerCase());
		if (property) {
			properties[property] = true;
		}
	}
	return properties;
}
