import { Message } from './message.entity';
import { FileUpload } from './file-upload.entity';

/**
 * Conversation state for one session id.
 *
 * History is append-only while a turn runs; only `clear()` (called by the
 * session store on reset) ever shortens it.
 */
export class Session {
  private readonly messages: Message[] = [];
  private readonly files = new Map<string, FileUpload>();
  private lastActivity: number;

  constructor(readonly sessionId: string, now = Date.now()) {
    this.lastActivity = now;
  }

  get history(): readonly Message[] {
    return this.messages;
  }

  get uploadedFiles(): FileUpload[] {
    return [...this.files.values()];
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  append(message: Message): number {
    this.messages.push(message);
    this.touch();
    return this.messages.length - 1;
  }

  putFile(file: FileUpload) {
    // last upload wins on a name collision
    this.files.set(file.name, file);
    this.touch();
  }

  touch(now = Date.now()) {
    this.lastActivity = now;
  }

  clear() {
    this.messages.length = 0;
    this.files.clear();
    this.touch();
  }
}
