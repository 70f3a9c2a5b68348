/**
 * Readers for loosely-typed Personio payloads.
 *
 * Personio wraps most employee fields as attribute objects
 * (`{ label, value, type }`) and nests related entities (department,
 * supervisor, employee references) as `{ type, attributes }`. These helpers
 * dig values out without trusting any particular shape.
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function asRecord(value: unknown): UnknownRecord {
  return isRecord(value) ? value : {};
}

/**
 * Unwrap an attribute object to its `value`. Plain values pass through.
 */
export function unwrapAttribute(raw: unknown): unknown {
  if (isRecord(raw) && "value" in raw) return raw.value;
  return raw;
}

/** Read `attributes.<key>` from a master record, unwrapped. */
export function attributeValue(record: UnknownRecord, key: string): unknown {
  const attributes = asRecord(record.attributes);
  if (key in attributes) return unwrapAttribute(attributes[key]);
  return undefined;
}

/**
 * Convert a scalar to a trimmed string; anything else (objects, null) is "".
 */
export function scalarText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  if (typeof value === "boolean") return String(value);
  return "";
}

/**
 * Display text for an attribute value. Nested entities resolve through
 * `label`, `name`, `attributes.name`, or their own `value`.
 */
export function displayText(value: unknown): string {
  const unwrapped = unwrapAttribute(value);
  if (!isRecord(unwrapped)) return scalarText(unwrapped);

  for (const key of ["label", "name", "title"]) {
    const text = scalarText(unwrapped[key]);
    if (text) return text;
  }
  const nestedName = attributeValue(unwrapped, "name");
  if (nestedName !== undefined) return displayText(nestedName);
  return "";
}

/** Id of a master record: `attributes.id.value`, else top-level `id`. */
export function masterEmployeeId(record: UnknownRecord): string | undefined {
  const id = scalarText(attributeValue(record, "id")) || scalarText(record.id);
  return id || undefined;
}

/**
 * Employee reference on a dependent record (employment, compensation,
 * document): `employee_id`, `employee.id`, or `employee.attributes.id.value`.
 */
export function referencedEmployeeId(record: UnknownRecord): string | undefined {
  const direct = scalarText(unwrapAttribute(record.employee_id));
  if (direct) return direct;

  const employee = unwrapAttribute(record.employee);
  if (isRecord(employee)) {
    const id = scalarText(employee.id) || scalarText(attributeValue(employee, "id"));
    if (id) return id;
  } else {
    const id = scalarText(employee);
    if (id) return id;
  }
  return undefined;
}
