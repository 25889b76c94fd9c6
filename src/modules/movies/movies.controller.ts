import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ParseIdPipe } from '@common/pipes/parse-id.pipe';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MoviesService } from './movies.service';
import { CreateMovieDto } from './dto/create-movie.dto';
import { UpdateMovieDto } from './dto/update-movie.dto';
import { MoviesWithShowtimesQueryDto, SearchMoviesDto } from './dto/search-movies.dto';
import { MovieResponseDto } from './dto/movie-response.dto';
import { Movie } from './entities/movie.entity';
import { Paginated, paginate } from '@common/dto/pagination-query.dto';

@ApiTags('movies')
@Controller('movies')
export class MoviesController {
  constructor(private readonly moviesService: MoviesService) {}

  @Post()
  @ApiOperation({ summary: 'Register a movie' })
  @ApiResponse({ status: 201, description: 'Movie created', type: MovieResponseDto })
  @ApiResponse({ status: 409, description: 'Movie with same title and release date exists' })
  async create(@Body() dto: CreateMovieDto): Promise<MovieResponseDto> {
    const movie = await this.moviesService.create(dto);
    return this.toResponseDto(movie);
  }

  @Get()
  @ApiOperation({ summary: 'Search movies by title and genre' })
  async search(@Query() query: SearchMoviesDto): Promise<Paginated<MovieResponseDto>> {
    const result = await this.moviesService.search(query);
    return paginate(result, query, (movie) => this.toResponseDto(movie));
  }

  @Get('showtimes')
  @ApiOperation({ summary: 'List movies that have showtimes from a given instant' })
  async findWithShowtimes(
    @Query() query: MoviesWithShowtimesQueryDto,
  ): Promise<Paginated<MovieResponseDto>> {
    const result = await this.moviesService.findWithShowtimes(query);
    return paginate(result, query, (movie) => this.toResponseDto(movie));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get movie by ID' })
  @ApiResponse({ status: 200, description: 'Movie details', type: MovieResponseDto })
  @ApiResponse({ status: 404, description: 'Movie not found' })
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<MovieResponseDto> {
    const movie = await this.moviesService.findById(id);
    return this.toResponseDto(movie);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Replace movie details' })
  @ApiResponse({ status: 200, description: 'Movie updated', type: MovieResponseDto })
  @ApiResponse({ status: 404, description: 'Movie not found' })
  @ApiResponse({ status: 409, description: 'Movie with same title and release date exists' })
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateMovieDto,
  ): Promise<MovieResponseDto> {
    const movie = await this.moviesService.update(id, dto);
    return this.toResponseDto(movie);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a movie without showtimes' })
  @ApiResponse({ status: 204, description: 'Movie deleted' })
  @ApiResponse({ status: 409, description: 'Movie has showtimes' })
  async remove(@Param('id', ParseIdPipe) id: number): Promise<void> {
    await this.moviesService.remove(id);
  }

  private toResponseDto(movie: Movie): MovieResponseDto {
    return {
      id: movie.id,
      title: movie.title,
      durationMinutes: movie.durationMinutes,
      genre: movie.genre,
      releaseDate: movie.releaseDate,
      description: movie.description,
    };
  }
}
