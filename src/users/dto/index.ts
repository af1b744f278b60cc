export * from './create-user.dto';
export * from './user-profile.dto';
