/**
 * Shared type definitions for the NETCONF XML layer
 * @module netconf-xml/types
 */

/**
 * In-memory XML element.
 *
 * `tag` and namespaced attribute names are in `{namespace}local` form.
 * Namespace declarations are not attributes; the serializer emits them.
 */
export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text?: string;
}

/**
 * Anything that can be turned into an element: the element itself, or an
 * XML document as text.
 */
export type XmlInput = XmlElement | string;

/**
 * Tag and attributes of a document's first element
 */
export interface RootDescriptor {
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
}

/**
 * A qualified name split into its parts
 */
export interface QualifiedName {
  readonly namespace?: string;
  readonly local: string;
}

/**
 * Acceptable root tag, or alternatives
 */
export type TagRequirement = string | readonly string[];

/**
 * Required attributes. Every entry must be satisfied; an entry that is a
 * list is satisfied by any one of its names.
 */
export type AttributeRequirements = ReadonlyArray<string | readonly string[]>;

/**
 * Filter criteria for retrieval operations
 */
export type FilterSpec =
  | { readonly type: 'subtree'; readonly criteria: XmlInput }
  | { readonly type: 'xpath'; readonly select: string }
  | XmlInput;

/**
 * Raises a MissingCapabilityError when the capability is not supported
 */
export type CapabilityAssertion = (capability: string) => void;

/**
 * Severity of an rpc-error
 */
export type RpcErrorSeverity = 'error' | 'warning';

/**
 * Contents of one rpc-error element of a reply
 */
export interface RpcError {
  readonly type?: string;
  readonly tag?: string;
  readonly severity?: RpcErrorSeverity;
  readonly appTag?: string;
  readonly path?: string;
  readonly message?: string;
  readonly info?: XmlElement;
}

/**
 * When replies carrying rpc-error elements are turned into exceptions.
 * - `none`: never; the reply is returned unparsed
 * - `errors`: when any error has severity `error`
 * - `all`: when any error is present, warnings included
 */
export type RaiseMode = 'none' | 'errors' | 'all';
