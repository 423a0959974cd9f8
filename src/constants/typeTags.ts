/**
 * JSON value kinds and the XML element each one becomes.
 *
 * The tag text doubles as the element name, so `TYPE_TAGS` is the only place
 * element names are spelled out.
 */

export const TYPE_TAGS = ["object", "array", "boolean", "number", "string", "null"] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

export type ContainerTag = Extract<TypeTag, "object" | "array">;

interface TypeTagTraits {
  /** Stays on the stack until an explicit close token */
  isContainer: boolean;
  /** Start-element is followed by one char-data token */
  needsCharData: boolean;
}

export const TYPE_TAG_TRAITS: Readonly<Record<TypeTag, TypeTagTraits>> = {
  object: { isContainer: true, needsCharData: false },
  array: { isContainer: true, needsCharData: false },
  boolean: { isContainer: false, needsCharData: true },
  number: { isContainer: false, needsCharData: true },
  string: { isContainer: false, needsCharData: true },
  null: { isContainer: false, needsCharData: false },
};

/** Attribute carrying an object member's key */
export const NAME_ATTRIBUTE = "name";

export const BOOLEAN_TEXT = {
  true: "true",
  false: "false",
} as const;

export const isContainerTag = (tag: TypeTag): tag is ContainerTag =>
  TYPE_TAG_TRAITS[tag].isContainer;
