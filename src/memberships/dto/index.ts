export * from './membership.dto';
