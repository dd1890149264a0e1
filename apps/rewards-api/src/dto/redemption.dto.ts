import { IsString, Matches } from "class-validator";

export class RedemptionCodeDto {
  @IsString()
  @Matches(/^\s*[A-Za-z0-9]{6,20}\s*$/, { message: "code must be 6-20 letters and digits" })
  code!: string;
}
