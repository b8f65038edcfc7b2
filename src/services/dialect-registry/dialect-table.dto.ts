import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Matches,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { CANONICAL_FIELDS, CanonicalField, LINE_ITEM_FIELDS, LineItemField } from '../../models/invoice-record';
import { FieldAggregate } from '../../models/dialect';

/**
 * Shape of the declarative dialect table (dialects.json). Validated once at
 * start-up and then compiled into immutable Dialect objects.
 */

const MATCHER_KINDS = ['namespace', 'rootName'] as const;
const AGGREGATES: readonly FieldAggregate[] = ['first', 'sum'];

export class DialectMatcherDto {
  @IsIn(MATCHER_KINDS)
  kind!: (typeof MATCHER_KINDS)[number];

  @ValidateIf((matcher: DialectMatcherDto) => matcher.kind === 'namespace')
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  namespaces?: string[];

  @ValidateIf((matcher: DialectMatcherDto) => matcher.kind === 'rootName' || matcher.rootNames !== undefined)
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  rootNames?: string[];
}

export class NamespaceBindingDto {
  @Matches(/^[A-Za-z_][A-Za-z0-9_.-]*$/, { message: 'prefix must be an XML name without a colon' })
  prefix!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  uris!: string[];
}

export class NumberFormatDto {
  @IsString()
  @Length(1, 1)
  decimalSeparator!: string;

  @IsOptional()
  @IsString()
  @Length(1, 1)
  thousandsSeparator?: string;
}

export class FieldRuleDto {
  @IsIn(CANONICAL_FIELDS)
  field!: CanonicalField;

  @IsString()
  @IsNotEmpty()
  path!: string;

  @IsOptional()
  @IsIn(AGGREGATES)
  aggregate?: FieldAggregate;
}

export class DefaultValueDto {
  @IsIn(CANONICAL_FIELDS)
  field!: CanonicalField;

  @IsString()
  @IsNotEmpty()
  value!: string;
}

export class LineItemFieldRuleDto {
  @IsIn(LINE_ITEM_FIELDS)
  field!: LineItemField;

  @IsString()
  @IsNotEmpty()
  path!: string;
}

export class LineItemMappingDto {
  @IsString()
  @IsNotEmpty()
  path!: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => LineItemFieldRuleDto)
  fields!: LineItemFieldRuleDto[];
}

export class DialectDto {
  @Matches(/^[a-z0-9][a-z0-9.-]*$/, { message: 'id must be lowercase letters, digits, dots and dashes' })
  id!: string;

  @IsString()
  @IsNotEmpty()
  label!: string;

  @ValidateNested()
  @Type(() => DialectMatcherDto)
  matcher!: DialectMatcherDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => NamespaceBindingDto)
  namespaces!: NamespaceBindingDto[];

  @ValidateNested()
  @Type(() => NumberFormatDto)
  numberFormat!: NumberFormatDto;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  dateFormats!: string[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DefaultValueDto)
  defaults?: DefaultValueDto[];

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => FieldRuleDto)
  fields!: FieldRuleDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => LineItemMappingDto)
  lineItems?: LineItemMappingDto;
}

export class DialectTableDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => DialectDto)
  dialects!: DialectDto[];
}
