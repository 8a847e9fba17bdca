import { Controller, Get, HttpStatus } from "@nestjs/common";
import { ApiOperation, ApiTags } from "@nestjs/swagger";
import { HealthService } from "./health.service";

@Controller('health')
@ApiTags('Health')
export class HealthController {
    constructor(private readonly healthService: HealthService) { }

    @Get('status')
    @ApiOperation({
        summary: 'Service status',
        description: 'Probes storage and reports document and chunk counts when it is reachable.'
    })
    async getStatus() {
        const report = await this.healthService.report();
        return {
            ...report,
            code: report.status === 'ok' ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE,
        };
    }

}
