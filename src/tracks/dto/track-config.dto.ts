import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { MAX_UPLOAD_BYTES } from '../track.constants';

// Formato del archivo de catálogo (config/tracks.json)

export class RequirementConfigDto {
  @Matches(/^[a-z0-9_]+$/, {
    message: 'documentType must be lower-case letters, digits or underscores',
  })
  documentType!: string;

  @IsString()
  @MinLength(1)
  displayLabel!: string;

  @IsBoolean()
  required!: boolean;

  @IsArray()
  @ArrayNotEmpty()
  @Matches(/^[a-z0-9]+$/, {
    each: true,
    message: 'acceptedFormats must be lower-case extensions without dot',
  })
  acceptedFormats!: string[];

  @IsInt()
  @Min(1)
  @Max(MAX_UPLOAD_BYTES, {
    message: `maxSizeBytes must not exceed the upload limit of ${MAX_UPLOAD_BYTES} bytes`,
  })
  maxSizeBytes!: number;

  @IsOptional()
  @IsString()
  description?: string;
}

export class TrackConfigDto {
  @Matches(/^[a-z0-9-]+$/, {
    message: 'id must be lower-case letters, digits or dashes',
  })
  id!: string;

  @IsString()
  @MinLength(1)
  label!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => RequirementConfigDto)
  requirements!: RequirementConfigDto[];
}

export class TrackCatalogConfigDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TrackConfigDto)
  tracks!: TrackConfigDto[];
}
