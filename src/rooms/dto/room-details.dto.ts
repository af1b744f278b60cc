export class RoomDetailsDto {
  id!: number;
  name!: string;
  ownerId!: number;
  createdAt!: string;
  iconHash!: string | null;
  isPasswordProtected!: boolean;
}
