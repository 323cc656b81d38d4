import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ConversionModule } from '@/modules/conversion/conversion.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), ConversionModule],
  controllers: [],
  providers: [],
})
export class AppModule {}
