import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Max, Min } from 'class-validator';

export class DatabaseConfig {
  @IsString()
  @IsNotEmpty()
  host!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  @IsString()
  @IsNotEmpty()
  username!: string;

  // empty is allowed for trust/peer authentication
  @IsString()
  password!: string;

  @IsString()
  @IsNotEmpty()
  database!: string;
}
