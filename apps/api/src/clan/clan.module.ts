import { Module } from '@nestjs/common';
import { ClanController } from './clan.controller';
import { ClanService } from './clan.service';
import { WgApiClientModule } from '@clan-lookup/wg-api-client';

@Module({
  imports: [WgApiClientModule],
  controllers: [ClanController],
  providers: [ClanService],
})
export class ClanModule {}
