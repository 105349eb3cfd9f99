import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { MatchingService } from './services/matching.service';
import { GroupsService } from './services/groups.service';
import { GroupListDto } from './dto/group.dto';

@ApiTags('Matching')
@Controller()
export class MatchingController {
  constructor(
    private readonly matching: MatchingService,
    private readonly groups: GroupsService,
  ) {}

  @Post('match')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Run matching',
    description:
      'Forms study groups for every course, replaces all stored groups and returns them.',
  })
  @ApiResponse({ status: 200, type: GroupListDto })
  @ApiResponse({ status: 409, description: 'A matching run is already in progress' })
  @ApiResponse({ status: 503, description: 'Storage is unavailable' })
  async runMatch(): Promise<GroupListDto> {
    const result = await this.matching.run();
    if (result.size === 0) return { groups: [] };
    return { groups: await this.groups.listGroups() };
  }

  @Get('groups')
  @ApiOperation({ summary: 'Latest groups, without rerunning the matcher' })
  @ApiResponse({ status: 200, type: GroupListDto })
  async getGroups(): Promise<GroupListDto> {
    return { groups: await this.groups.listGroups() };
  }
}
