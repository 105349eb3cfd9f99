import { ApiProperty } from '@nestjs/swagger';

export class GroupMemberDto {
  @ApiProperty({ example: 12 })
  id!: number;

  @ApiProperty({ example: 'Ada Lovelace' })
  name!: string;

  @ApiProperty({ example: 'ada@example.edu' })
  email!: string;
}

export class GroupDto {
  @ApiProperty({ example: 3 })
  groupId!: number;

  @ApiProperty({ example: 1 })
  courseId!: number;

  @ApiProperty({ example: 'CS101' })
  courseCode!: string;

  @ApiProperty({ example: 'Intro to Computer Science' })
  courseName!: string;

  @ApiProperty({ example: 1, description: '1-based position within the course' })
  groupIndex!: number;

  @ApiProperty({ type: [GroupMemberDto] })
  members!: GroupMemberDto[];
}

export class GroupListDto {
  @ApiProperty({ type: [GroupDto] })
  groups!: GroupDto[];
}
