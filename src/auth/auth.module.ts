import { Module } from '@nestjs/common';
import { FyersAuthService } from './fyers-auth.service';
import { TokenStoreService } from './token-store.service';

@Module({
  providers: [TokenStoreService, FyersAuthService],
  exports: [TokenStoreService, FyersAuthService],
})
export class AuthModule {}
