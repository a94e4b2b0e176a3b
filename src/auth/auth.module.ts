import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SessionAuthService } from './session-auth.service';
import { HttpAuthGuard } from './http-auth.guard';
import { InternalAuthGuard } from './internal-auth.guard';

@Module({
  imports: [ConfigModule],
  providers: [SessionAuthService, HttpAuthGuard, InternalAuthGuard],
  exports: [SessionAuthService, HttpAuthGuard, InternalAuthGuard],
})
export class AuthModule {}
