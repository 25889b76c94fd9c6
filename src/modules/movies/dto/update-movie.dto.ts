import { CreateMovieDto } from './create-movie.dto';

export class UpdateMovieDto extends CreateMovieDto {}
