import { Injectable, ConflictException, NotFoundException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, ILike, Repository } from 'typeorm';
import { Movie } from './entities/movie.entity';
import { Showtime } from '@modules/showtimes/entities/showtime.entity';
import { CreateMovieDto } from './dto/create-movie.dto';
import { UpdateMovieDto } from './dto/update-movie.dto';
import { MoviesWithShowtimesQueryDto, SearchMoviesDto } from './dto/search-movies.dto';
import { toSkipTake } from '@common/dto/pagination-query.dto';

@Injectable()
export class MoviesService {
  private readonly logger = new Logger(MoviesService.name);

  constructor(
    @InjectRepository(Movie)
    private readonly movieRepository: Repository<Movie>,
    @InjectRepository(Showtime)
    private readonly showtimeRepository: Repository<Showtime>,
  ) {}

  async create(dto: CreateMovieDto): Promise<Movie> {
    const title = dto.title.trim();
    await this.assertUnique(title, dto.releaseDate);

    const movie = this.movieRepository.create({
      title,
      durationMinutes: dto.durationMinutes,
      genre: dto.genre.trim(),
      releaseDate: dto.releaseDate,
      description: dto.description ?? null,
    });

    const saved = await this.movieRepository.save(movie);
    this.logger.log(`Movie created: ${saved.id} (${saved.title})`);
    return saved;
  }

  async findById(id: number): Promise<Movie> {
    const movie = await this.movieRepository.findOne({ where: { id } });
    if (!movie) {
      throw new NotFoundException(`Movie with ID ${id} not found`);
    }
    return movie;
  }

  async search(query: SearchMoviesDto): Promise<[Movie[], number]> {
    const where: FindOptionsWhere<Movie> = {};
    if (query.title) {
      where.title = ILike(`%${query.title}%`);
    }
    if (query.genre) {
      where.genre = ILike(`%${query.genre}%`);
    }

    return this.movieRepository.findAndCount({
      where,
      order: { title: 'ASC' },
      ...toSkipTake(query),
    });
  }

  async findWithShowtimes(query: MoviesWithShowtimesQueryDto): Promise<[Movie[], number]> {
    const { skip, take } = toSkipTake(query);

    return this.movieRepository
      .createQueryBuilder('movie')
      .innerJoin(Showtime, 'showtime', 'showtime.movie_id = movie.id')
      .where('showtime.start_time >= :from', { from: new Date(query.from) })
      .andWhere('showtime.status = :status', { status: query.status })
      .distinct(true)
      .orderBy('movie.title', 'ASC')
      .skip(skip)
      .take(take)
      .getManyAndCount();
  }

  async update(id: number, dto: UpdateMovieDto): Promise<Movie> {
    const existing = await this.findById(id);
    const title = dto.title.trim();

    const titleIsChanging = existing.title !== title;
    const releaseDateIsChanging = existing.releaseDate !== dto.releaseDate;
    if (titleIsChanging || releaseDateIsChanging) {
      await this.assertUnique(title, dto.releaseDate);
    }

    existing.title = title;
    existing.durationMinutes = dto.durationMinutes;
    existing.genre = dto.genre.trim();
    existing.releaseDate = dto.releaseDate;
    existing.description = dto.description ?? null;

    return this.movieRepository.save(existing);
  }

  async remove(id: number): Promise<void> {
    const movie = await this.findById(id);

    const showtimes = await this.showtimeRepository.countBy({ movieId: id });
    if (showtimes > 0) {
      throw new ConflictException(
        `Cannot delete movie with ID ${id} because it has ${showtimes} showtime(s)`,
      );
    }

    await this.movieRepository.remove(movie);
    this.logger.log(`Movie deleted: ${id}`);
  }

  private async assertUnique(title: string, releaseDate: string): Promise<void> {
    const existing = await this.movieRepository.findOne({ where: { title, releaseDate } });
    if (existing) {
      throw new ConflictException(
        `A movie titled '${title}' released on ${releaseDate} already exists`,
      );
    }
  }
}
