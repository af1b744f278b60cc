export class UserProfileDto {
  id!: number;
  username!: string;
  createdAt!: string;
  avatarHash!: string | null;
}
