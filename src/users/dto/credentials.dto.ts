import { IsNotEmpty, IsString, MinLength } from 'class-validator';

// Flags of register and login
export class CredentialsDto {
  @IsString()
  @IsNotEmpty({ message: 'username must not be empty' })
  username!: string;

  @IsString()
  @MinLength(4, { message: 'password must be at least 4 characters' })
  password!: string;
}
