export interface User {
  userId: number;              // sequential, starts at 1
  username: string;            // unique
  hashedPassword: string;      // hex sha256(password + salt)
  salt: string;                // 8 random bytes, hex
  registrationDate: Date;
}
