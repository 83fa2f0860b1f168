import { Test, TestingModule } from '@nestjs/testing';
import { Message } from '../../entities';
import { ChatMemoryService } from './chat-memory.service';

describe('ChatMemoryService', () => {
  let service: ChatMemoryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ChatMemoryService],
    }).compile();

    service = module.get<ChatMemoryService>(ChatMemoryService);
  });

  it('creates a session on first use and returns the same one afterwards', () => {
    const first = service.getOrCreate('s1');
    const again = service.getOrCreate('s1');

    expect(again).toBe(first);
    expect(first.history).toEqual([]);
    expect(service.size()).toBe(1);
  });

  it('does not create sessions on snapshot', () => {
    expect(service.snapshot('missing')).toBeUndefined();
    expect(service.size()).toBe(0);
  });

  it('resets one session without touching another', () => {
    service.getOrCreate('a').append(Message.human('for a'));
    service.getOrCreate('b').append(Message.human('for b'));
    service.registerUpload('a', { name: 'x.csv', size: 1, contentType: 'text/csv', storageRef: 'http://files.test/x', uploadedAt: 0 });

    service.reset('a');

    expect(service.snapshot('a')?.history).toEqual([]);
    expect(service.snapshot('a')?.uploadedFiles).toEqual([]);
    expect(service.snapshot('b')?.history.map((message) => message.content)).toEqual(['for b']);
  });

  it('ignores a reset of an unknown session', () => {
    service.reset('nobody');

    expect(service.size()).toBe(0);
  });

  it('replaces an upload that reuses a name', () => {
    service.registerUpload('s1', { name: 'data.csv', size: 1, contentType: 'text/csv', storageRef: 'http://files.test/1', uploadedAt: 0 });
    service.registerUpload('s1', { name: 'data.csv', size: 2, contentType: 'text/csv', storageRef: 'http://files.test/2', uploadedAt: 1 });

    expect(service.snapshot('s1')?.uploadedFiles.map((file) => file.storageRef)).toEqual(['http://files.test/2']);
  });

  it('sweeps idle sessions that are not busy', () => {
    service.getOrCreate('idle').touch(1_000);
    service.getOrCreate('busy').touch(1_000);
    service.getOrCreate('fresh').touch(5_000);

    const evicted = service.sweepIdle(2_000, (sessionId) => sessionId === 'busy');

    expect(evicted).toEqual(['idle']);
    expect(service.snapshot('idle')).toBeUndefined();
    expect(service.snapshot('busy')).toBeDefined();
    expect(service.size()).toBe(2);
  });
});
