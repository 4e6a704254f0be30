import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { WgApiClientModule } from '@clan-lookup/wg-api-client';

import { ClanModule } from '../clan/clan.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env']
    }),
    WgApiClientModule,
    ClanModule,
  ],
})
export class AppModule {}
