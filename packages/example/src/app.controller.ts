import { Body, Controller, Get, HttpCode, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { UnknownFormulaError } from 'nestjs-blocking-detector';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  /**
   * 获取所有 formula 的检测器状态
   */
  @Get('formulas')
  getFormulas() {
    return this.appService.getFormulaStatus();
  }

  /**
   * 分发一条报告，未指定 formula 时分发给所有 formula
   */
  @Post('reports')
  async dispatchReport(@Body() payload: unknown, @Query('formula') formulaId?: string) {
    try {
      return await this.appService.dispatchReport(formulaId, payload);
    } catch (error) {
      if (error instanceof UnknownFormulaError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }

  /**
   * 手动替换 formula
   */
  @Post('formulas/:id/replace')
  @HttpCode(204)
  async replaceFormula(@Param('id') formulaId: string) {
    try {
      await this.appService.replaceFormula(formulaId);
    } catch (error) {
      if (error instanceof UnknownFormulaError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }
}
