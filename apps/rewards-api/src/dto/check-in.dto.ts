import { IsLatitude, IsLongitude, IsString, Length } from "class-validator";

export class CheckInDto {
  @IsString()
  @Length(1, 128)
  locationId!: string;

  @IsLatitude()
  latitude!: number;

  @IsLongitude()
  longitude!: number;
}
