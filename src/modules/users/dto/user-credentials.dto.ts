import { ApiProperty } from '@nestjs/swagger';
import { IsByteLength, IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class UserCredentialsDto {
  @ApiProperty({ example: 'alice', maxLength: 80 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(80)
  username!: string;

  @ApiProperty({ example: 'pw123', writeOnly: true })
  // bcrypt ignores everything past the 72nd byte
  @IsString()
  @IsNotEmpty()
  @IsByteLength(1, 72)
  password!: string;
}
