import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from "@nestjs/common";
import { ApiOkResponse, ApiOperation, ApiQuery, ApiTags } from "@nestjs/swagger";
import { z } from "zod";
import { SearchHitDto, similarSearchBodySchema, SimilarSearchDto, SimilarityMatchDto, textSearchQuerySchema } from "./dto/search.dto";
import { SearchService } from "./search.service";

function parseOrBadRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new BadRequestException(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
    }
    return result.data;
}

@Controller('search')
@ApiTags('Search')
export class SearchController {
    constructor(private readonly searchService: SearchService) { }

    @Get()
    @ApiOperation({
        summary: 'Full-text search',
        description: 'Matches chunk content with web-search syntax (quoted phrases, OR, -exclusions).'
    })
    @ApiQuery({ name: 'q', required: true })
    @ApiQuery({ name: 'limit', required: false, type: Number })
    @ApiOkResponse({ type: [SearchHitDto] })
    async search(
        @Query() query: Record<string, unknown>,
    ) {
        const { q, limit } = parseOrBadRequest(textSearchQuerySchema, query);
        return await this.searchService.textSearch(q, limit);
    }

    @Post('similar')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({
        summary: 'Similarity search',
        description: 'Embeds the query and returns the closest chunks above the configured threshold.'
    })
    @ApiOkResponse({ type: [SimilarityMatchDto] })
    async similar(
        @Body() body: SimilarSearchDto,
    ) {
        const { query, limit } = parseOrBadRequest(similarSearchBodySchema, body);
        return await this.searchService.similarTo(query, limit);
    }
}
