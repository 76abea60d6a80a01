import { ApiProperty, PartialType } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateCourseItemDto {
  @ApiProperty({ example: 'Intro', maxLength: 100 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiProperty({ example: 'Course', maxLength: 50 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  type!: string;

  // unknown ids of any length are the service's 404
  @ApiProperty({ example: '3f2b8c1d9e7a4b6c8d0e1f2a3b4c5d6e' })
  @IsString()
  @IsNotEmpty()
  specialization_id!: string;
}

// Omitted fields keep their stored values.
export class UpdateCourseItemDto extends PartialType(CreateCourseItemDto) {}
