import { Body, Controller, Get, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { StudentsService } from './students.service';
import { StudentDto, UpsertStudentDto } from './dto/upsert-student.dto';

@ApiTags('Students')
@Controller('students')
export class StudentsController {
  constructor(private readonly studentsService: StudentsService) {}

  @Get()
  @ApiOperation({ summary: 'List students, newest first' })
  @ApiResponse({ status: 200, type: [StudentDto] })
  findAll(): Promise<StudentDto[]> {
    return this.studentsService.findAll();
  }

  @Post()
  @ApiOperation({
    summary: 'Register or update a student',
    description:
      'Matches on email. Courses and availability are replaced by the submitted lists.',
  })
  @ApiResponse({ status: 201, type: StudentDto })
  @ApiResponse({ status: 400, description: 'Missing name or invalid email' })
  upsert(@Body() dto: UpsertStudentDto): Promise<StudentDto> {
    return this.studentsService.upsert(dto);
  }
}
