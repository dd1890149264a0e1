import { IsIn, IsInt, IsString, Length, Min } from "class-validator";

export type AdjustmentKind = "BONUS" | "REFUND";

export class AdjustmentDto {
  @IsIn(["BONUS", "REFUND"])
  kind!: AdjustmentKind;

  @IsInt()
  @Min(1)
  amount!: number;

  @IsString()
  @Length(1, 200)
  reason!: string;
}
