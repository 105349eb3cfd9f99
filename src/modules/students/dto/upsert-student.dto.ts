import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
} from 'class-validator';

export class UpsertStudentDto {
  @ApiProperty({ example: 'Ada Lovelace' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({
    example: 'ada@example.edu',
    description: 'Identifies the student; an existing student with this email is updated',
  })
  @Transform(({ value }) =>
    typeof value === 'string' ? value.trim().toLowerCase() : value,
  )
  @IsEmail()
  email!: string;

  @ApiPropertyOptional({
    example: 3,
    default: 3,
    description: 'Preferred group size, clamped to 2..5; missing or 0 means 3',
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  preferredGroupSize?: number;

  @ApiPropertyOptional({ type: [Number], example: [1, 2] })
  @IsOptional()
  @IsArray()
  @Type(() => Number)
  @IsInt({ each: true })
  courseIds?: number[];

  @ApiPropertyOptional({ type: [Number], example: [1, 4] })
  @IsOptional()
  @IsArray()
  @Type(() => Number)
  @IsInt({ each: true })
  availabilityTimeslotIds?: number[];
}

export class StudentDto {
  @ApiProperty({ example: 12 })
  id!: number;

  @ApiProperty({ example: 'Ada Lovelace' })
  name!: string;

  @ApiProperty({ example: 'ada@example.edu' })
  email!: string;

  @ApiProperty({ example: 3 })
  preferredGroupSize!: number;

  @ApiProperty({ type: [Number], example: [1, 2] })
  courseIds!: number[];

  @ApiProperty({ type: [Number], example: [1, 4] })
  availabilityTimeslotIds!: number[];
}
