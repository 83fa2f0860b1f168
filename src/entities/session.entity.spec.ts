import { Message } from './message.entity';
import { Session } from './session.entity';

describe('Session', () => {
  it('appends messages and reports their index', () => {
    const session = new Session('s1', 0);

    expect(session.append(Message.human('a'))).toBe(0);
    expect(session.append(Message.assistant('b'))).toBe(1);
    expect(session.history.map((message) => message.content)).toEqual(['a', 'b']);
    expect(session.lastActivityAt).toBeGreaterThan(0);
  });

  it('clears history and files together', () => {
    const session = new Session('s1');
    session.append(Message.human('a'));
    session.putFile({ name: 'x', size: 1, contentType: 'text/plain', storageRef: 'http://files.test/x', uploadedAt: 0 });

    session.clear();

    expect(session.history).toEqual([]);
    expect(session.uploadedFiles).toEqual([]);
  });
});

describe('Message', () => {
  it('cannot be changed after creation', () => {
    const message = Message.assistant('x', { status: 'success', stdout: '1' });

    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.executionResult)).toBe(true);
  });
});
