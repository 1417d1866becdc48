/**
 * CSS-selector extraction schema. One item is produced per element matching
 * `baseSelector`; each field is evaluated relative to that element.
 */
export interface ExtractionSchema {
  name: string;
  baseSelector: string;
  fields: SchemaField[];
}

interface FieldBase {
  name: string;
  /** Omitted: the field reads the scope element itself. */
  selector?: string;
}

export interface TextField extends FieldBase {
  type: 'text' | 'html';
  default?: string;
}

export interface AttributeField extends FieldBase {
  type: 'attribute';
  attribute: string;
  default?: string;
}

export interface ListField extends FieldBase {
  type: 'list';
  fields: SchemaField[];
}

export type SchemaField = TextField | AttributeField | ListField;

export type FieldType = SchemaField['type'];

export type ExtractedValue = string | ExtractedItem[];

export interface ExtractedItem {
  [field: string]: ExtractedValue;
}
