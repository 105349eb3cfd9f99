import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CourseEntity, TimeSlotEntity } from '@/database/entities';
import { CatalogController } from './catalog.controller';
import { CatalogService } from './catalog.service';

@Module({
  imports: [TypeOrmModule.forFeature([CourseEntity, TimeSlotEntity])],
  providers: [CatalogService],
  controllers: [CatalogController],
})
export class CatalogModule {}
