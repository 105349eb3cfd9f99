import { Test } from '@nestjs/testing';
import { MatchingController } from './matching.controller';
import { MatchingService } from './services/matching.service';
import { GroupsService } from './services/groups.service';
import { GroupView } from './types/matching.types';

describe('MatchingController', () => {
  const view: GroupView = {
    groupId: 1,
    courseId: 1,
    courseCode: 'CS101',
    courseName: 'Intro to Computer Science',
    groupIndex: 1,
    members: [{ id: 4, name: 'Ada', email: 'ada@example.edu' }],
  };

  const matching = { run: jest.fn() };
  const groups = { listGroups: jest.fn() };
  let controller: MatchingController;

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [MatchingController],
      providers: [
        { provide: MatchingService, useValue: matching },
        { provide: GroupsService, useValue: groups },
      ],
    }).compile();

    controller = moduleRef.get(MatchingController);
  });

  it('returns the stored groups after a run', async () => {
    matching.run.mockResolvedValue(new Map([[1, [[4]]]]));
    groups.listGroups.mockResolvedValue([view]);

    await expect(controller.runMatch()).resolves.toEqual({ groups: [view] });
  });

  it('returns no groups when there was nothing to match', async () => {
    matching.run.mockResolvedValue(new Map());

    await expect(controller.runMatch()).resolves.toEqual({ groups: [] });
    expect(groups.listGroups).not.toHaveBeenCalled();
  });

  it('surfaces run failures', async () => {
    matching.run.mockRejectedValue(new Error('store down'));

    await expect(controller.runMatch()).rejects.toThrow('store down');
  });

  it('lists groups without running the matcher', async () => {
    groups.listGroups.mockResolvedValue([view]);

    await expect(controller.getGroups()).resolves.toEqual({ groups: [view] });
    expect(matching.run).not.toHaveBeenCalled();
  });
});
