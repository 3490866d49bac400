// Holdings, scene and activity log models
export * from './Holdings';
export * from './Scene';
export * from './ActivityEvent';
