import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CatalogService } from './catalog.service';

@ApiTags('Catalog')
@Controller()
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  @Get('courses')
  @ApiOperation({ summary: 'Courses, ordered by code' })
  listCourses() {
    return this.catalog.listCourses();
  }

  @Get('timeslots')
  @ApiOperation({ summary: 'Timeslots, ordered by day then start time' })
  listTimeslots() {
    return this.catalog.listTimeslots();
  }
}
