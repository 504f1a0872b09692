import { Module } from '@nestjs/common';

import { ApiKeysModule } from '../api-keys/api-keys.module';
import { HttpClientModule } from '../http-client/http-client.module';
import { OcrController } from './ocr.controller';
import { OcrEngineService } from './ocr-engine.service';

@Module({
  imports: [ApiKeysModule, HttpClientModule],
  controllers: [OcrController],
  providers: [OcrEngineService],
})
export class OcrModule {}
