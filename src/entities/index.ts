export * from './message.entity';
export * from './session.entity';
export * from './file-upload.entity';
