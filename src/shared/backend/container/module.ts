import type { MaskerConfig } from '../../config';
import type { IRandomSource, ITextFileRepository } from '../ports';
import { MathRandomSource } from '../random';
import { TextFileRepository } from '../repositories';
import { SerialMasker } from '../serial-masking';
import { MaskFileUseCase } from '../use-cases/mask-file.use-case';
import { Container } from './container';
import { MASK_FILE_USE_CASE, RANDOM_SOURCE, SERIAL_MASKER, TEXT_FILE_REPOSITORY } from './tokens';

/**
 * Create the container for one masking run.
 * Providers are registered lazily; override a token before resolving to swap an implementation.
 */
export function createMaskerContainer(config: Pick<MaskerConfig, 'tokenStyle'>): Container {
    const container = new Container();

    container
        .register<IRandomSource>(RANDOM_SOURCE, () => new MathRandomSource())
        .register<ITextFileRepository>(TEXT_FILE_REPOSITORY, () => new TextFileRepository())
        .register(SERIAL_MASKER, () => {
            const random = container.resolve<IRandomSource>(RANDOM_SOURCE);
            return new SerialMasker(random, { tokenStyle: config.tokenStyle });
        })
        .register(MASK_FILE_USE_CASE, () => {
            return new MaskFileUseCase({
                masker: container.resolve<SerialMasker>(SERIAL_MASKER),
                fileRepo: container.resolve<ITextFileRepository>(TEXT_FILE_REPOSITORY),
            });
        });

    return container;
}
