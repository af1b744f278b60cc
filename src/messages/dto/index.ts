export * from './post-message.dto';
export * from './timeline-query.dto';
export * from './message.dto';
