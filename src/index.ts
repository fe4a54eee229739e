export * from './layoutGuides';
