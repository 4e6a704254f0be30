import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { WgApiClientService } from './wg-api-client.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [WgApiClientService],
  exports: [WgApiClientService],
})
export class WgApiClientModule {}
