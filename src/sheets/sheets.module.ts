import { Module } from '@nestjs/common';
import { existsSync } from 'fs';
import { resolve } from 'path';

import { AppConfigService, ConfigException } from '../config';
import { GoogleSheetsGateway } from './google-sheets.gateway';
import { SheetClientService } from './sheet-client.service';
import { SPREADSHEET_GATEWAY } from './sheets.constants';
import { SpreadsheetGateway } from './spreadsheet-gateway.interface';

@Module({
  providers: [
    {
      provide: SPREADSHEET_GATEWAY,
      useFactory: (configService: AppConfigService): SpreadsheetGateway => {
        const keyFile = resolve(configService.get('sheet.credentialsFile'));
        if (!existsSync(keyFile)) {
          throw new ConfigException(
            `Credentials file not found: ${keyFile}. Set GOOGLE_APPLICATION_CREDENTIALS or sheet.credentialsFile to a service account key file.`,
          );
        }
        return new GoogleSheetsGateway(keyFile);
      },
      inject: [AppConfigService],
    },
    SheetClientService,
  ],
  exports: [SheetClientService],
})
export class SheetsModule {}
