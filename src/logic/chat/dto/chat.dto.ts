import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class SubmitTurnDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  sessionId?: string;

  @IsString()
  @IsNotEmpty()
  prompt!: string;
}

export class SessionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  sessionId!: string;
}
