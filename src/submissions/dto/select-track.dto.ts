import { IsString, Matches } from 'class-validator';

export class SelectTrackDto {
  @IsString()
  @Matches(/^[a-z0-9-]+$/, { message: 'trackId has an invalid format' })
  trackId!: string;
}
