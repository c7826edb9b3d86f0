export * from './session.entity';
export * from './transcript.entity';
