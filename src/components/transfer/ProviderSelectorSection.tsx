import { metadataOf } from '@/lib/providers'
import { canNext, canPrevious } from '@/lib/session'
import { useMigration } from '@/hooks/useMigration'
import ProviderLoginButton from './ProviderLoginButton'

interface ProviderSelectorSectionProps {
    isMobile: boolean
}

export default function ProviderSelectorSection({ isMobile }: ProviderSelectorSectionProps) {
    const { controller, state } = useMigration()
    const source = controller.activeSource()
    const destination = controller.activeDestination()
    const hasPrevious = canPrevious(state.session)
    const hasNext = canNext(state.session)

    return (
        <div
            className={`
                relative bg-cover bg-center bg-no-repeat flex items-center justify-center p-4
                ${isMobile ? 'flex-col space-y-4' : 'flex-row space-x-6 h-full'}
            `}
            style={{
                backgroundImage: "url('/Buttons/UI_Background.png')",
                backgroundSize: '100% 100%'
            }}
        >
            {/* Source picker */}
            <div className="flex flex-col items-center space-y-2">
                <p className="text-xs font-mono text-green-300">FROM</p>
                <div className="flex items-center space-x-2">
                    <button
                        onClick={() => controller.previous()}
                        disabled={!hasPrevious}
                        className={hasPrevious ? 'text-green-400 hover:text-green-300' : 'text-gray-600 cursor-not-allowed'}
                        aria-label="Previous source"
                    >
                        ‹
                    </button>
                    <span className="font-mono text-sm">{metadataOf(source).name}</span>
                    <button
                        onClick={() => controller.next()}
                        disabled={!hasNext}
                        className={hasNext ? 'text-green-400 hover:text-green-300' : 'text-gray-600 cursor-not-allowed'}
                        aria-label="Next source"
                    >
                        ›
                    </button>
                </div>
                <ProviderLoginButton provider={source} isMobile={isMobile} />
            </div>

            <button
                onClick={() => controller.swap()}
                className="text-green-400 hover:text-green-300 font-mono text-lg"
                title="Swap source and destination"
                aria-label="Swap source and destination"
            >
                ⇄
            </button>

            {/* Destination */}
            <div className="flex flex-col items-center space-y-2">
                <p className="text-xs font-mono text-green-300">TO</p>
                <span className="font-mono text-sm">{metadataOf(destination).name}</span>
                <ProviderLoginButton provider={destination} isMobile={isMobile} />
            </div>
        </div>
    )
}
