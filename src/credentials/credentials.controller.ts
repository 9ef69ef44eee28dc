import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { toNumber } from '../common/utils/decimal.util';
import { CredentialsService, maskKey } from './credentials.service';
import { CreateCredentialDto } from './dto/create-credential.dto';
import { CredentialResponseDto } from './dto/credential-response.dto';
import { CredentialRecord } from './entities/credential.entity';

function toResponse(record: CredentialRecord): CredentialResponseDto {
  return {
    apiName: record.apiName,
    apiKey: maskKey(record.apiKey),
    totalInvestment: toNumber(record.totalInvestment),
    createdAt: record.createdAt.toISOString(),
  };
}

@Controller('sessions/:sessionId')
export class CredentialsController {
  constructor(private readonly credentialsService: CredentialsService) {}

  /**
   * Validates the key pair against the exchange and stores it.
   *
   * POST /sessions/:sessionId/credentials
   */
  @Post('credentials')
  @HttpCode(HttpStatus.CREATED)
  async saveCredential(
    @Param('sessionId') sessionId: string,
    @Body() dto: CreateCredentialDto,
  ): Promise<CredentialResponseDto> {
    const record = await this.credentialsService.saveCredential({ sessionId }, dto);
    return toResponse(record);
  }

  /**
   * GET /sessions/:sessionId/credentials
   */
  @Get('credentials')
  async listCredentials(@Param('sessionId') sessionId: string): Promise<CredentialResponseDto[]> {
    const records = await this.credentialsService.listCredentials({ sessionId });
    return records.map(toResponse);
  }

  /**
   * DELETE /sessions/:sessionId/credentials/:apiName
   */
  @Delete('credentials/:apiName')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeCredential(
    @Param('sessionId') sessionId: string,
    @Param('apiName') apiName: string,
  ): Promise<void> {
    await this.credentialsService.removeCredential({ sessionId }, apiName);
  }

  /**
   * Clears credentials and snapshot history for the session.
   *
   * POST /sessions/:sessionId/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  async reset(@Param('sessionId') sessionId: string) {
    await this.credentialsService.reset({ sessionId });
    return { message: 'Configuration and history cleared' };
  }
}
