import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import {
  ExtractionSchema,
  FieldType,
  SchemaField,
} from '../types/extraction-schema';

const FIELD_TYPES: FieldType[] = ['text', 'html', 'attribute', 'list'];

export class SchemaFieldDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  selector?: string;

  @IsIn(FIELD_TYPES)
  type!: FieldType;

  @ValidateIf((field: SchemaFieldDto) => field.type === 'attribute')
  @IsString()
  @IsNotEmpty()
  attribute?: string;

  @IsOptional()
  @IsString()
  default?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SchemaFieldDto)
  fields?: SchemaFieldDto[];
}

export class ExtractionSchemaDto {
  @IsOptional()
  @IsString()
  name: string = 'custom';

  @IsString()
  @IsNotEmpty()
  baseSelector!: string;

  /** May be empty: each base element then yields an empty item. */
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SchemaFieldDto)
  fields!: SchemaFieldDto[];
}

export function toSchemaField(dto: SchemaFieldDto): SchemaField {
  const base = dto.selector
    ? { name: dto.name, selector: dto.selector }
    : { name: dto.name };

  switch (dto.type) {
    case 'list':
      return { ...base, type: 'list', fields: (dto.fields ?? []).map(toSchemaField) };
    case 'attribute':
      return {
        ...base,
        type: 'attribute',
        attribute: dto.attribute ?? '',
        default: dto.default,
      };
    case 'text':
    case 'html':
      return { ...base, type: dto.type, default: dto.default };
  }
}

export function toExtractionSchema(dto: ExtractionSchemaDto): ExtractionSchema {
  return {
    name: dto.name,
    baseSelector: dto.baseSelector,
    fields: dto.fields.map(toSchemaField),
  };
}
