import { IsNotEmpty, IsNumber, IsString, Max, MaxLength, Min } from 'class-validator';

export const MAX_INVESTMENT = 1_000_000_000;

// Setup form: one exchange API key pair plus the money put into that account.
export class CreateCredentialDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  apiName!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  apiKey!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  apiSecret!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(MAX_INVESTMENT)
  totalInvestment!: number;
}
